/**
 * ChainLoader — delegates to an ordered list of loaders.
 *
 * The first loader that reports `exists(name)` answers every call for that
 * name. When none can, the error lists what each loader reported.
 */

import { LoaderError } from '../../core/errors.js'
import type { Loader } from './loader.js'

export class ChainLoader implements Loader {
  private readonly _loaders: Loader[] = []
  private readonly _existsCache = new Map<string, boolean>()

  constructor(loaders: Loader[] = []) {
    for (const loader of loaders) {
      this.addLoader(loader)
    }
  }

  addLoader(loader: Loader): void {
    this._loaders.push(loader)
    this._existsCache.clear()
  }

  getLoaders(): readonly Loader[] {
    return this._loaders
  }

  getSource(name: string): string {
    return this.delegate(name, (loader) => loader.getSource(name))
  }

  getCacheKey(name: string): string {
    return this.delegate(name, (loader) => loader.getCacheKey(name))
  }

  isFresh(name: string, time: number): boolean {
    return this.delegate(name, (loader) => loader.isFresh(name, time))
  }

  exists(name: string): boolean {
    const cached = this._existsCache.get(name)
    if (cached !== undefined) {
      return cached
    }
    const found = this._loaders.some((loader) => loader.exists(name))
    this._existsCache.set(name, found)
    return found
  }

  private delegate<T>(name: string, call: (loader: Loader) => T): T {
    const failures: string[] = []
    for (const loader of this._loaders) {
      if (!loader.exists(name)) {
        continue
      }
      try {
        return call(loader)
      } catch (err) {
        if (!(err instanceof LoaderError)) {
          throw err
        }
        failures.push(err.message)
      }
    }

    const detail = failures.length > 0 ? ` (${failures.join(', ')})` : ''
    throw new LoaderError(`Template "${name}" is not defined${detail}.`)
  }
}
