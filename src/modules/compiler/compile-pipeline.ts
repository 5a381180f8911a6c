/**
 * CompilePipeline interface and the narrow environment view the default
 * compiler reads extension state through.
 */

import type {
  BinaryOperator,
  NodeVisitor,
  TemplateFilter,
  TemplateFunction,
  TemplateTest,
  UnaryOperator,
} from '../extension/extension.js'
import type { EscapingStrategy } from '../extension/escaper-extension.js'

// ---------------------------------------------------------------------------
// CompilePipeline
// ---------------------------------------------------------------------------

/**
 * Turns template source into executable content: the body of a JavaScript
 * function returning a `TemplateUnit`.
 */
export interface CompilePipeline {
  /**
   * @throws {TemplateSyntaxError} when any stage fails
   */
  compile(source: string, name: string): string
}

// ---------------------------------------------------------------------------
// CompilerEnvironment
// ---------------------------------------------------------------------------

export interface CompilerEnvironment {
  getUnaryOperators(): ReadonlyMap<string, UnaryOperator>
  getBinaryOperators(): ReadonlyMap<string, BinaryOperator>
  getFilter(name: string): TemplateFilter | undefined
  getFunction(name: string): TemplateFunction | undefined
  getTest(name: string): TemplateTest | undefined
  getNodeVisitors(): NodeVisitor[]
  /** Strategy applied to `{{ }}` output; false when autoescaping is off */
  getAutoescapeStrategy(): EscapingStrategy | false
}
