/**
 * StagingExtension — collects filters, functions, tests and node visitors
 * registered directly on an environment rather than through an extension.
 */

import type {
  Extension,
  NodeVisitor,
  TemplateFilter,
  TemplateFunction,
  TemplateTest,
} from './extension.js'

export class StagingExtension implements Extension {
  readonly name = '__staging__'

  private readonly _filters = new Map<string, TemplateFilter>()
  private readonly _functions = new Map<string, TemplateFunction>()
  private readonly _tests = new Map<string, TemplateTest>()
  private readonly _visitors: NodeVisitor[] = []

  addFilter(filter: TemplateFilter): void {
    this._filters.set(filter.name, filter)
  }

  addFunction(fn: TemplateFunction): void {
    this._functions.set(fn.name, fn)
  }

  addTest(test: TemplateTest): void {
    this._tests.set(test.name, test)
  }

  addNodeVisitor(visitor: NodeVisitor): void {
    this._visitors.push(visitor)
  }

  getFilters(): TemplateFilter[] {
    return [...this._filters.values()]
  }

  getFunctions(): TemplateFunction[] {
    return [...this._functions.values()]
  }

  getTests(): TemplateTest[] {
    return [...this._tests.values()]
  }

  getNodeVisitors(): NodeVisitor[] {
    return [...this._visitors]
  }
}
