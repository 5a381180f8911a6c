/**
 * Extension contracts — the pluggable bundles that contribute filters,
 * functions, tests, operators, node visitors and globals to an environment.
 */

import type { ModuleNode } from '../compiler/nodes.js'
import type { Environment } from '../environment/environment.js'

// ---------------------------------------------------------------------------
// Callables
// ---------------------------------------------------------------------------

/** A filter, function or test implementation. Arguments arrive untyped from templates. */
export type TemplateCallable = (...args: unknown[]) => unknown

export interface CallableOptions {
  /** Output of this callable is already safe and is not auto-escaped */
  isSafe?: boolean
}

abstract class NamedCallable {
  constructor(
    public readonly name: string,
    public readonly callable: TemplateCallable,
    public readonly options: CallableOptions = {}
  ) {}

  get isSafe(): boolean {
    return this.options.isSafe === true
  }
}

/** `{{ value|name(args) }}` */
export class TemplateFilter extends NamedCallable {}

/** `{{ name(args) }}` */
export class TemplateFunction extends NamedCallable {}

/** `{% if value is name(args) %}` */
export class TemplateTest extends NamedCallable {}

/**
 * Consulted when no extension registered a filter or function of that name.
 * Returning undefined passes the name on to the next callback.
 */
export type UndefinedFilterCallback = (name: string) => TemplateFilter | undefined
export type UndefinedFunctionCallback = (name: string) => TemplateFunction | undefined

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export type Associativity = 'left' | 'right'

/**
 * Unary operator. `compile` receives the generated source of the operand and
 * returns the generated source of the whole expression.
 */
export interface UnaryOperator {
  precedence: number
  compile: (operand: string) => string
}

export type BinaryOperator =
  | {
      kind: 'expression'
      precedence: number
      associativity: Associativity
      compile: (left: string, right: string) => string
    }
  | {
      /** `is` / `is not`: the right-hand side is parsed as a test */
      kind: 'test'
      precedence: number
      negated: boolean
    }

export interface ExtensionOperators {
  unary?: Record<string, UnaryOperator>
  binary?: Record<string, BinaryOperator>
}

// ---------------------------------------------------------------------------
// Node visitors
// ---------------------------------------------------------------------------

/** A pass over the parsed tree, run after parsing and before code generation */
export interface NodeVisitor {
  readonly name: string
  /** Lower priorities run first */
  readonly priority: number
  visit(module: ModuleNode): ModuleNode
}

// ---------------------------------------------------------------------------
// Extension
// ---------------------------------------------------------------------------

export interface Extension {
  /** Unique name within an environment */
  readonly name: string
  getFilters?(): TemplateFilter[]
  getFunctions?(): TemplateFunction[]
  getTests?(): TemplateTest[]
  getOperators?(): ExtensionOperators
  getNodeVisitors?(): NodeVisitor[]
  getGlobals?(): Record<string, unknown>
  /**
   * Configuration that changes generated code (e.g. an escaping strategy).
   * It is part of the extension signature, so changing it changes every
   * template identity.
   */
  getConfigSignature?(): string
  /** Epoch milliseconds of the last change to this extension's behaviour */
  getLastModified?(): number
  /** Called once, before the first template instance is created */
  initRuntime?(env: Environment): void
}
