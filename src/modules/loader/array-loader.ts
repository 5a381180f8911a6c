/**
 * ArrayLoader — serves templates from an in-memory name → source map.
 *
 * Useful for tests and for templates assembled at runtime. Sources never go
 * stale; a changed source yields a new cache key instead.
 */

import { LoaderError } from '../../core/errors.js'
import type { Loader } from './loader.js'

export class ArrayLoader implements Loader {
  private readonly _templates = new Map<string, string>()

  constructor(templates: Record<string, string> = {}) {
    for (const [name, source] of Object.entries(templates)) {
      this._templates.set(name, source)
    }
  }

  setTemplate(name: string, source: string): void {
    this._templates.set(name, source)
  }

  getSource(name: string): string {
    return this.require(name)
  }

  getCacheKey(name: string): string {
    return `${name}:${this.require(name)}`
  }

  isFresh(name: string, _time: number): boolean {
    this.require(name)
    return true
  }

  exists(name: string): boolean {
    return this._templates.has(name)
  }

  private require(name: string): string {
    const source = this._templates.get(name)
    if (source === undefined) {
      throw new LoaderError(`Template "${name}" is not defined.`)
    }
    return source
  }
}
