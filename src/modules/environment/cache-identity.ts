/**
 * TemplateIdentityDeriver — the cache identity of a template.
 *
 * An identity names "this template, compiled under this extension
 * composition, for this host". It keys the in-process unit registry, the
 * environment's memo table and (through the store's key) the persisted
 * artifact.
 */

import { LoaderError, LogicError } from '../../core/errors.js'
import { sha256 } from '../../utils/helpers.js'
import type { Loader } from '../loader/loader.js'

export const IDENTITY_PREFIX = '__Template_'

/** The host the compiled code targets */
export interface HostProfile {
  major: number
  minor: number
  /** Whether an optional native acceleration layer is present */
  accelerated: boolean
}

export function currentHostProfile(): HostProfile {
  const [major = 0, minor = 0] = process.versions.node.split('.').map(Number)
  return { major, minor, accelerated: false }
}

/** What an identity is derived from */
export interface IdentitySources {
  getLoader(): Loader
  getExtensionSignature(): string
  getHostProfile(): HostProfile
}

export class TemplateIdentityDeriver {
  constructor(private readonly sources: IdentitySources) {}

  /**
   * @param index - distinguishes sub-templates compiled from one source
   * @throws {LoaderError} for an empty name, or when the loader does not know it
   * @throws {LogicError} when `index` is not a non-negative integer
   */
  deriveIdentity(name: string, index?: number): string {
    if (name === '') {
      throw new LoaderError('A template name must not be empty.')
    }
    if (index !== undefined && (!Number.isInteger(index) || index < 0)) {
      throw new LogicError(`Template index must be a non-negative integer, got ${String(index)}.`, {
        name,
        index,
      })
    }

    const host = this.sources.getHostProfile()
    const key =
      this.sources.getLoader().getCacheKey(name) +
      this.sources.getExtensionSignature() +
      (host.accelerated ? '1' : '') +
      `:${String(host.major)}:${String(host.minor)}`

    const identity = IDENTITY_PREFIX + sha256(key)
    return index === undefined ? identity : `${identity}_${String(index)}`
  }
}
