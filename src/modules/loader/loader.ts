/**
 * Loader interface — resolves template names to source text and staleness metadata.
 */

// ---------------------------------------------------------------------------
// Loader interface
// ---------------------------------------------------------------------------

export interface Loader {
  /**
   * Return the source text of a template.
   * @throws {LoaderError} when the template does not exist or cannot be read
   */
  getSource(name: string): string

  /**
   * Return a key uniquely identifying the template within this loader.
   * Compiled artifacts are cached under an identity derived from this key.
   * @throws {LoaderError} when the template does not exist
   */
  getCacheKey(name: string): string

  /**
   * Whether the template has not changed since `time` (epoch milliseconds).
   * @throws {LoaderError} when the template does not exist
   */
  isFresh(name: string, time: number): boolean

  /** Whether this loader can provide the template */
  exists(name: string): boolean
}
