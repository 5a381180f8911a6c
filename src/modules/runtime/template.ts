/**
 * Template — a loaded, renderable template bound to its environment.
 */

import { TemplateError, TemplateRuntimeError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'
import type { TemplateFilter, TemplateFunction, TemplateTest } from '../extension/extension.js'
import { TemplateRuntime } from './runtime.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TemplateContext = Record<string, unknown>

/**
 * The object a compiled artifact evaluates to. One unit exists per cache
 * identity per process.
 */
export interface TemplateUnit {
  readonly templateName: string
  display(context: TemplateContext, runtime: TemplateRuntime, out: string[]): void
}

/** A template name or an already loaded template */
export type TemplateCandidate = string | Template

/** A single candidate or an ordered list tried first to last */
export type TemplateCandidates = TemplateCandidate | readonly TemplateCandidate[]

/**
 * What a rendering template needs from its environment.
 */
export interface RuntimeEnvironment {
  getFilter(name: string): TemplateFilter | undefined
  getFunction(name: string): TemplateFunction | undefined
  getTest(name: string): TemplateTest | undefined
  isStrictVariables(): boolean
  getCharset(): string
  /** A fresh context: globals overlaid by `context` */
  mergeGlobals(context: TemplateContext): TemplateContext
  resolveTemplate(candidates: TemplateCandidates): Template
}

export type TemplateConstructor = new (env: RuntimeEnvironment, unit: TemplateUnit) => Template

// ---------------------------------------------------------------------------
// Template
// ---------------------------------------------------------------------------

export class Template {
  constructor(
    protected readonly env: RuntimeEnvironment,
    protected readonly unit: TemplateUnit
  ) {}

  getTemplateName(): string {
    return this.unit.templateName
  }

  /**
   * Render with the environment's globals overlaid by `context`.
   * @throws {TemplateError} rendering failures, annotated with the template name
   */
  render(context: TemplateContext = {}): string {
    const out: string[] = []
    const runtime = new TemplateRuntime(this.env, this.unit.templateName)
    try {
      this.unit.display(this.env.mergeGlobals(context), runtime, out)
    } catch (err: unknown) {
      if (err instanceof TemplateError) {
        if (err.templateName === undefined) {
          err.setTemplateName(this.unit.templateName)
        }
        throw err
      }
      throw new TemplateRuntimeError(
        `An exception has been thrown during the rendering of a template ("${errorMessage(err)}").`,
        { templateName: this.unit.templateName, cause: err }
      )
    }
    return out.join('')
  }

  /** Render and write the output to `stream` */
  display(context: TemplateContext = {}, stream: NodeJS.WritableStream = process.stdout): void {
    stream.write(this.render(context))
  }
}
