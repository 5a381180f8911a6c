/**
 * ExtensionSet — aggregates the extensions registered on an environment.
 *
 * The set is open for registration until it is initialized, which happens the
 * first time its lookup tables are needed (compiling a template) or the
 * runtime is initialized (instantiating a template). Initialization is one-way.
 */

import { LogicError } from '../../core/errors.js'
import type { Environment } from '../environment/environment.js'
import type {
  BinaryOperator,
  Extension,
  NodeVisitor,
  TemplateFilter,
  TemplateFunction,
  TemplateTest,
  UnaryOperator,
  UndefinedFilterCallback,
  UndefinedFunctionCallback,
} from './extension.js'
import { StagingExtension } from './staging-extension.js'

// ---------------------------------------------------------------------------
// ExtensionRegistry interface
// ---------------------------------------------------------------------------

/**
 * The view of the extension set the template pipeline depends on.
 */
export interface ExtensionRegistry {
  /** Composition of everything that affects generated code */
  getSignature(): string
  /** Latest modification time (epoch ms) across all extensions */
  getLastModified(): number
  /** Globals contributed by extensions; later extensions win on collision */
  getGlobals(): Record<string, unknown>
  isInitialized(): boolean
  /** One-time runtime initialization; later calls are no-ops */
  initRuntime(env: Environment): void
}

// ---------------------------------------------------------------------------
// ExtensionSet
// ---------------------------------------------------------------------------

export class ExtensionSet implements ExtensionRegistry {
  private readonly _extensions = new Map<string, Extension>()
  private readonly _staging = new StagingExtension()

  private _initialized = false
  private _runtimeInitialized = false
  private _signature: string | null = null

  private readonly _filters = new Map<string, TemplateFilter>()
  private readonly _functions = new Map<string, TemplateFunction>()
  private readonly _tests = new Map<string, TemplateTest>()
  private readonly _unaryOperators = new Map<string, UnaryOperator>()
  private readonly _binaryOperators = new Map<string, BinaryOperator>()
  private _visitors: NodeVisitor[] = []

  private readonly _undefinedFilterCallbacks: UndefinedFilterCallback[] = []
  private readonly _undefinedFunctionCallbacks: UndefinedFunctionCallback[] = []

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  addExtension(extension: Extension): void {
    if (this.isInitialized()) {
      throw new LogicError(
        `Unable to register extension "${extension.name}" as extensions have already been initialized.`,
        { extension: extension.name }
      )
    }
    if (this._extensions.has(extension.name)) {
      throw new LogicError(
        `Unable to register extension "${extension.name}" as it is already registered.`,
        { extension: extension.name }
      )
    }
    this._extensions.set(extension.name, extension)
    this._signature = null
  }

  setExtensions(extensions: Extension[]): void {
    for (const extension of extensions) {
      this.addExtension(extension)
    }
  }

  hasExtension(name: string): boolean {
    return this._extensions.has(name)
  }

  getExtension(name: string): Extension {
    const extension = this._extensions.get(name)
    if (extension === undefined) {
      throw new LogicError(`The "${name}" extension is not enabled.`, { extension: name })
    }
    return extension
  }

  getExtensions(): Extension[] {
    return [...this._extensions.values()]
  }

  addFilter(filter: TemplateFilter): void {
    this.assertOpen('filter', filter.name)
    this._staging.addFilter(filter)
    this._signature = null
  }

  addFunction(fn: TemplateFunction): void {
    this.assertOpen('function', fn.name)
    this._staging.addFunction(fn)
    this._signature = null
  }

  addTest(test: TemplateTest): void {
    this.assertOpen('test', test.name)
    this._staging.addTest(test)
    this._signature = null
  }

  addNodeVisitor(visitor: NodeVisitor): void {
    this.assertOpen('node visitor', visitor.name)
    this._staging.addNodeVisitor(visitor)
    this._signature = null
  }

  /** Callbacks stay open after initialization; they run in registration order */
  registerUndefinedFilterCallback(callback: UndefinedFilterCallback): void {
    this._undefinedFilterCallbacks.push(callback)
  }

  registerUndefinedFunctionCallback(callback: UndefinedFunctionCallback): void {
    this._undefinedFunctionCallbacks.push(callback)
  }

  // -------------------------------------------------------------------------
  // ExtensionRegistry
  // -------------------------------------------------------------------------

  getSignature(): string {
    if (this._signature === null) {
      this._signature = JSON.stringify(this.allExtensions().map(describeExtension))
    }
    return this._signature
  }

  getLastModified(): number {
    let lastModified = 0
    for (const extension of this._extensions.values()) {
      lastModified = Math.max(lastModified, extension.getLastModified?.() ?? 0)
    }
    return lastModified
  }

  getGlobals(): Record<string, unknown> {
    const globals: Record<string, unknown> = {}
    for (const extension of this._extensions.values()) {
      Object.assign(globals, extension.getGlobals?.() ?? {})
    }
    return globals
  }

  isInitialized(): boolean {
    return this._initialized || this._runtimeInitialized
  }

  initRuntime(env: Environment): void {
    if (this._runtimeInitialized) {
      return
    }
    this._runtimeInitialized = true
    for (const extension of this._extensions.values()) {
      extension.initRuntime?.(env)
    }
  }

  // -------------------------------------------------------------------------
  // Lookups (initialize the set)
  // -------------------------------------------------------------------------

  getFilter(name: string): TemplateFilter | undefined {
    this.initExtensions()
    return this._filters.get(name) ?? firstDefined(this._undefinedFilterCallbacks, name)
  }

  getFilters(): TemplateFilter[] {
    this.initExtensions()
    return [...this._filters.values()]
  }

  getFunction(name: string): TemplateFunction | undefined {
    this.initExtensions()
    return this._functions.get(name) ?? firstDefined(this._undefinedFunctionCallbacks, name)
  }

  getFunctions(): TemplateFunction[] {
    this.initExtensions()
    return [...this._functions.values()]
  }

  getTest(name: string): TemplateTest | undefined {
    this.initExtensions()
    return this._tests.get(name)
  }

  getTests(): TemplateTest[] {
    this.initExtensions()
    return [...this._tests.values()]
  }

  getUnaryOperators(): ReadonlyMap<string, UnaryOperator> {
    this.initExtensions()
    return this._unaryOperators
  }

  getBinaryOperators(): ReadonlyMap<string, BinaryOperator> {
    this.initExtensions()
    return this._binaryOperators
  }

  getNodeVisitors(): NodeVisitor[] {
    this.initExtensions()
    return [...this._visitors]
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private allExtensions(): Extension[] {
    return [...this._extensions.values(), this._staging]
  }

  private assertOpen(kind: string, name: string): void {
    if (this.isInitialized()) {
      throw new LogicError(
        `Unable to add ${kind} "${name}" as extensions have already been initialized.`,
        { kind, name }
      )
    }
  }

  private initExtensions(): void {
    if (this._initialized) {
      return
    }

    const visitors: NodeVisitor[] = []
    for (const extension of this.allExtensions()) {
      for (const filter of extension.getFilters?.() ?? []) {
        this._filters.set(filter.name, filter)
      }
      for (const fn of extension.getFunctions?.() ?? []) {
        this._functions.set(fn.name, fn)
      }
      for (const test of extension.getTests?.() ?? []) {
        this._tests.set(test.name, test)
      }
      const operators = extension.getOperators?.() ?? {}
      for (const [name, operator] of Object.entries(operators.unary ?? {})) {
        this._unaryOperators.set(name, operator)
      }
      for (const [name, operator] of Object.entries(operators.binary ?? {})) {
        this._binaryOperators.set(name, operator)
      }
      visitors.push(...(extension.getNodeVisitors?.() ?? []))
    }

    // Stable sort keeps registration order among equal priorities
    this._visitors = visitors.sort((a, b) => a.priority - b.priority)
    this._initialized = true
  }
}

function firstDefined<T>(callbacks: Array<(name: string) => T | undefined>, name: string): T | undefined {
  for (const callback of callbacks) {
    const found = callback(name)
    if (found !== undefined) {
      return found
    }
  }
  return undefined
}

// ---------------------------------------------------------------------------
// Signature
// ---------------------------------------------------------------------------

function describeExtension(extension: Extension): Record<string, unknown> {
  const operators = extension.getOperators?.() ?? {}
  return {
    name: extension.name,
    config: extension.getConfigSignature?.() ?? null,
    filters: (extension.getFilters?.() ?? []).map((f) => f.name),
    functions: (extension.getFunctions?.() ?? []).map((f) => f.name),
    tests: (extension.getTests?.() ?? []).map((t) => t.name),
    unary: Object.keys(operators.unary ?? {}),
    binary: Object.keys(operators.binary ?? {}),
    visitors: (extension.getNodeVisitors?.() ?? []).map((v) => `${v.name}:${String(v.priority)}`),
  }
}
