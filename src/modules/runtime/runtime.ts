/**
 * TemplateRuntime — the helper object generated template code calls into.
 *
 * One runtime is created per render; it carries the template name so that
 * errors raised from generated code point at the right template and line.
 */

import { LoaderError, TemplateError, TemplateRuntimeError } from '../../core/errors.js'
import { errorMessage, isPlainObject } from '../../utils/helpers.js'
import { escape } from '../extension/escaper-extension.js'
import type { TemplateCallable } from '../extension/extension.js'
import { Template } from './template.js'
import type {
  RuntimeEnvironment,
  TemplateCandidate,
  TemplateContext,
} from './template.js'
import {
  compare,
  contains,
  equals,
  iterate,
  toNumber,
  toStr,
  truthy,
  type IterationEntry,
} from './values.js'

export interface LoopContext {
  index: number
  index0: number
  revindex: number
  revindex0: number
  first: boolean
  last: boolean
  length: number
}

export class TemplateRuntime {
  constructor(
    private readonly env: RuntimeEnvironment,
    readonly templateName: string
  ) {}

  // -------------------------------------------------------------------------
  // Variables and attributes
  // -------------------------------------------------------------------------

  variable(context: TemplateContext, name: string, lineno: number, lenient: boolean): unknown {
    if (Object.hasOwn(context, name)) {
      return context[name]
    }
    if (lenient || !this.env.isStrictVariables()) {
      return undefined
    }
    throw this.error(`Variable "${name}" does not exist.`, lineno)
  }

  /**
   * `object.key` / `object[key]`. Map entries, array indexes and object
   * properties are looked up in that order; a method is called without
   * arguments.
   */
  attribute(object: unknown, key: unknown, lineno: number, lenient: boolean): unknown {
    const strict = !lenient && this.env.isStrictVariables()
    const name = toStr(key)

    if (object === undefined || object === null) {
      if (!strict) return undefined
      throw this.error(
        `Impossible to access an attribute ("${name}") on a null variable.`,
        lineno
      )
    }

    if (object instanceof Map) {
      if (object.has(key)) return object.get(key)
      if (object.has(name)) return object.get(name)
    } else if (Array.isArray(object)) {
      const index = toNumber(key)
      if (Number.isInteger(index) && index >= 0 && index < object.length) {
        return object[index]
      }
    } else if ((typeof object === 'object' || typeof object === 'function') && name in object) {
      const value: unknown = Reflect.get(object, name)
      if (typeof value === 'function') {
        return this.guard(lineno, () => Reflect.apply(value, object, []))
      }
      return value
    }

    if (!strict) return undefined
    throw this.error(
      isPlainObject(object) || object instanceof Map || Array.isArray(object)
        ? `Key "${name}" does not exist.`
        : `Neither the property "${name}" nor a method "${name}()" exist.`,
      lineno
    )
  }

  // -------------------------------------------------------------------------
  // Extension callables
  // -------------------------------------------------------------------------

  filter(name: string, lineno: number, ...args: unknown[]): unknown {
    const filter = this.env.getFilter(name)
    if (filter === undefined) {
      throw this.error(`Unknown "${name}" filter.`, lineno)
    }
    return this.call(filter.callable, lineno, args)
  }

  callFunction(name: string, lineno: number, ...args: unknown[]): unknown {
    const fn = this.env.getFunction(name)
    if (fn === undefined) {
      throw this.error(`Unknown "${name}" function.`, lineno)
    }
    return this.call(fn.callable, lineno, args)
  }

  test(name: string, lineno: number, ...args: unknown[]): boolean {
    const test = this.env.getTest(name)
    if (test === undefined) {
      throw this.error(`Unknown "${name}" test.`, lineno)
    }
    return truthy(this.call(test.callable, lineno, args))
  }

  escape(value: unknown, strategy: string): string {
    return escape(value, strategy)
  }

  // -------------------------------------------------------------------------
  // Value semantics
  // -------------------------------------------------------------------------

  toStr(value: unknown): string {
    return toStr(value)
  }

  toNumber(value: unknown): number {
    return toNumber(value)
  }

  truthy(value: unknown): boolean {
    return truthy(value)
  }

  iterate(value: unknown): IterationEntry[] {
    return iterate(value)
  }

  equals(left: unknown, right: unknown): boolean {
    return equals(left, right)
  }

  compare(left: unknown, right: unknown): number {
    return compare(left, right)
  }

  contains(haystack: unknown, needle: unknown): boolean {
    return contains(haystack, needle)
  }

  loop(index0: number, length: number): LoopContext {
    return {
      index: index0 + 1,
      index0,
      revindex: length - index0,
      revindex0: length - index0 - 1,
      first: index0 === 0,
      last: index0 === length - 1,
      length,
    }
  }

  // -------------------------------------------------------------------------
  // Include
  // -------------------------------------------------------------------------

  /**
   * Render another template. `template` is a name, a loaded template or a
   * list of candidates; the included template sees the current context
   * overlaid by `variables`, or only `variables` when `only` is set.
   */
  include(
    template: unknown,
    variables: unknown,
    context: TemplateContext,
    only: boolean,
    ignoreMissing: boolean,
    lineno: number
  ): string {
    let extra: TemplateContext = {}
    if (isPlainObject(variables)) {
      extra = variables
    } else if (variables !== null) {
      throw this.error('Variables passed to an include must be a hash.', lineno)
    }
    const candidates = this.toCandidates(template, lineno)
    const vars: TemplateContext = only ? { ...extra } : { ...context, ...extra }

    let loaded: Template
    try {
      loaded = this.env.resolveTemplate(candidates)
    } catch (err: unknown) {
      if (ignoreMissing && err instanceof LoaderError) {
        return ''
      }
      if (err instanceof TemplateError && err.lineno <= 0 && err.templateName === undefined) {
        err.setLineno(lineno)
      }
      throw err
    }
    return loaded.render(vars)
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private toCandidates(value: unknown, lineno: number): TemplateCandidate[] {
    const items = Array.isArray(value) ? value : [value]
    return items.map((item: unknown): TemplateCandidate => {
      if (typeof item === 'string' || item instanceof Template) {
        return item
      }
      throw this.error(`Unable to include a template from a value of type "${typeof item}".`, lineno)
    })
  }

  private call(callable: TemplateCallable, lineno: number, args: unknown[]): unknown {
    return this.guard(lineno, () => callable(...args))
  }

  /** Annotate failures thrown by user code with the current position */
  private guard(lineno: number, fn: () => unknown): unknown {
    try {
      return fn()
    } catch (err: unknown) {
      if (err instanceof TemplateError) {
        if (err.templateName === undefined) err.setTemplateName(this.templateName)
        if (err.lineno <= 0) err.setLineno(lineno)
        throw err
      }
      throw new TemplateRuntimeError(
        `An exception has been thrown during the rendering of a template ("${errorMessage(err)}").`,
        { templateName: this.templateName, lineno, cause: err }
      )
    }
  }

  private error(message: string, lineno: number): TemplateRuntimeError {
    return new TemplateRuntimeError(message, { templateName: this.templateName, lineno })
  }
}
