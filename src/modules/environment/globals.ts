/**
 * GlobalsRegistry — variables available to every template.
 *
 * Two phases. While the extension set is not initialized, `add` always
 * succeeds. Afterwards the globals are resolved once into a snapshot
 * (extension globals overlaid by local ones); only names already in the
 * snapshot may still be updated.
 */

import { LogicError } from '../../core/errors.js'
import type { ExtensionRegistry } from '../extension/extension-set.js'
import type { TemplateContext } from '../runtime/template.js'

/** Plain assignment would run the `__proto__` setter instead of storing an entry */
function setEntry(record: Record<string, unknown>, name: string, value: unknown): void {
  Object.defineProperty(record, name, { value, writable: true, enumerable: true, configurable: true })
}

export class GlobalsRegistry {
  private readonly _locals: Record<string, unknown> = {}
  private _resolved: Record<string, unknown> | null = null

  constructor(private readonly extensions: Pick<ExtensionRegistry, 'isInitialized' | 'getGlobals'>) {}

  /**
   * @throws {LogicError} when `name` is new and the extensions are initialized
   */
  add(name: string, value: unknown): void {
    if (this.extensions.isInitialized() && !Object.hasOwn(this.getAll(), name)) {
      throw new LogicError(
        `Unable to add global "${name}" as the runtime or the extensions have already been initialized.`,
        { name }
      )
    }

    if (this._resolved !== null) {
      setEntry(this._resolved, name, value)
    } else {
      setEntry(this._locals, name, value)
    }
  }

  getAll(): Readonly<Record<string, unknown>> {
    if (this.extensions.isInitialized()) {
      if (this._resolved === null) {
        this._resolved = { ...this.extensions.getGlobals(), ...this._locals }
      }
      return this._resolved
    }
    return { ...this.extensions.getGlobals(), ...this._locals }
  }

  /** `context` plus every global it does not define itself */
  merge(context: TemplateContext): TemplateContext {
    const merged: TemplateContext = { ...context }
    for (const [name, value] of Object.entries(this.getAll())) {
      if (!Object.hasOwn(merged, name)) {
        setEntry(merged, name, value)
      }
    }
    return merged
  }
}
