/**
 * FreshnessChecker — whether a cached artifact may still be used.
 */

import type { Loader } from '../loader/loader.js'

export interface FreshnessSources {
  getLoader(): Loader
  /** Latest modification time across extensions (epoch ms) */
  getExtensionLastModified(): number
}

export class FreshnessChecker {
  constructor(private readonly sources: FreshnessSources) {}

  /**
   * An artifact cached at `time` is fresh when neither the extensions nor the
   * template source changed after it. The loader is not consulted when the
   * extensions are already newer.
   */
  isFresh(name: string, time: number): boolean {
    return (
      this.sources.getExtensionLastModified() <= time && this.sources.getLoader().isFresh(name, time)
    )
  }
}
