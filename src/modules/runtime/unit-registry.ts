/**
 * UnitRegistry — the process-wide table of activated template units.
 *
 * Activating compiled content is irreversible for the life of the registry:
 * a unit is defined once per cache identity, and the environment checks
 * `has()` before it ever reads an artifact or compiles source.
 */

import { LogicError, TemplateRuntimeError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'
import type { TemplateUnit } from './template.js'

export function isTemplateUnit(value: unknown): value is TemplateUnit {
  return (
    typeof value === 'object' &&
    value !== null &&
    'templateName' in value &&
    typeof value.templateName === 'string' &&
    'display' in value &&
    typeof value.display === 'function'
  )
}

/**
 * Evaluate compiled content (the body of a function returning a unit).
 * @throws {TemplateRuntimeError} when the content does not evaluate to a unit
 */
export function evaluateUnit(content: string, identity: string): TemplateUnit {
  let value: unknown
  try {
    // eslint-disable-next-line @typescript-eslint/no-implied-eval
    value = new Function(content)()
  } catch (err: unknown) {
    throw new TemplateRuntimeError(
      `Unable to activate compiled template "${identity}" (${errorMessage(err)}).`,
      { cause: err, context: { identity } }
    )
  }
  if (!isTemplateUnit(value)) {
    throw new TemplateRuntimeError(
      `Compiled template "${identity}" did not produce a template unit.`,
      { context: { identity } }
    )
  }
  return value
}

export class UnitRegistry {
  private readonly _units = new Map<string, TemplateUnit>()

  has(identity: string): boolean {
    return this._units.has(identity)
  }

  get(identity: string): TemplateUnit | undefined {
    return this._units.get(identity)
  }

  /**
   * Evaluate `content` and record the unit under `identity`.
   * @throws {LogicError} when the identity is already defined
   */
  define(identity: string, content: string): TemplateUnit {
    if (this._units.has(identity)) {
      throw new LogicError(`Template unit "${identity}" is already defined.`, { identity })
    }
    const unit = evaluateUnit(content, identity)
    this._units.set(identity, unit)
    return unit
  }

  get size(): number {
    return this._units.size
  }
}

/** Units shared by every environment that does not bring its own registry */
export const processUnits = new UnitRegistry()
