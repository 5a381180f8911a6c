/**
 * extension module — barrel exports
 */

export type {
  Extension,
  ExtensionOperators,
  TemplateCallable,
  CallableOptions,
  UnaryOperator,
  BinaryOperator,
  Associativity,
  NodeVisitor,
  UndefinedFilterCallback,
  UndefinedFunctionCallback,
} from './extension.js'
export { TemplateFilter, TemplateFunction, TemplateTest } from './extension.js'
export type { ExtensionRegistry } from './extension-set.js'
export { ExtensionSet } from './extension-set.js'
export { CoreExtension } from './core-extension.js'
export {
  EscaperExtension,
  escape,
  isEscapingStrategy,
  ESCAPING_STRATEGIES,
} from './escaper-extension.js'
export type { EscapingStrategy } from './escaper-extension.js'
export {
  OptimizerExtension,
  TextMergingVisitor,
  OPTIMIZE_ALL,
  OPTIMIZE_NONE,
} from './optimizer-extension.js'
