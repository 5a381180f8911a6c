/**
 * OptimizerExtension — tree passes that shrink generated code without
 * changing output.
 */

import type { ModuleNode, StatementNode } from '../compiler/nodes.js'
import type { Extension, NodeVisitor } from './extension.js'

/** All optimizations */
export const OPTIMIZE_ALL = -1
/** No optimizations */
export const OPTIMIZE_NONE = 0

/**
 * Merges adjacent text nodes and drops empty ones, at every nesting level.
 */
export class TextMergingVisitor implements NodeVisitor {
  readonly name = 'text-merging'
  readonly priority = 255

  visit(module: ModuleNode): ModuleNode {
    return { ...module, body: mergeText(module.body) }
  }
}

function mergeText(body: StatementNode[]): StatementNode[] {
  const result: StatementNode[] = []
  for (const node of body) {
    const optimized = optimizeChildren(node)
    if (optimized.type === 'text') {
      if (optimized.data === '') continue
      const previous = result[result.length - 1]
      if (previous?.type === 'text') {
        result[result.length - 1] = { ...previous, data: previous.data + optimized.data }
        continue
      }
    }
    result.push(optimized)
  }
  return result
}

function optimizeChildren(node: StatementNode): StatementNode {
  switch (node.type) {
    case 'if':
      return {
        ...node,
        branches: node.branches.map((b) => ({ ...b, body: mergeText(b.body) })),
        elseBody: node.elseBody === null ? null : mergeText(node.elseBody),
      }
    case 'for':
      return {
        ...node,
        body: mergeText(node.body),
        elseBody: node.elseBody === null ? null : mergeText(node.elseBody),
      }
    default:
      return node
  }
}

export class OptimizerExtension implements Extension {
  readonly name = 'optimizer'

  constructor(private readonly level: number = OPTIMIZE_ALL) {}

  getConfigSignature(): string {
    return String(this.level)
  }

  getNodeVisitors(): NodeVisitor[] {
    return this.level === OPTIMIZE_NONE ? [] : [new TextMergingVisitor()]
  }
}
