/**
 * Cache target — the `cache` environment option, resolved once into a
 * tagged variant.
 */

import { LogicError } from '../../core/errors.js'
import { isArtifactStore, NullArtifactStore, type ArtifactStore } from './artifact-store.js'
import { FilesystemArtifactStore } from './filesystem-store.js'

/** `false` disables caching; a string is a cache directory */
export type CacheOption = false | string | ArtifactStore

export type CacheTarget =
  | { kind: 'disabled' }
  | { kind: 'filesystem'; path: string }
  | { kind: 'custom'; store: ArtifactStore }

/**
 * @throws {LogicError} when the option is not one of the accepted forms
 */
export function resolveCacheTarget(option: unknown): CacheTarget {
  if (option === false) {
    return { kind: 'disabled' }
  }
  if (typeof option === 'string') {
    if (option === '') {
      throw new LogicError('The cache directory must not be empty.')
    }
    return { kind: 'filesystem', path: option }
  }
  if (isArtifactStore(option)) {
    return { kind: 'custom', store: option }
  }
  throw new LogicError(
    'The cache option must be false, a directory path or an artifact store.',
    { type: option === null ? 'null' : typeof option }
  )
}

export function createArtifactStore(target: CacheTarget): ArtifactStore {
  switch (target.kind) {
    case 'disabled':
      return new NullArtifactStore()
    case 'filesystem':
      return new FilesystemArtifactStore(target.path)
    case 'custom':
      return target.store
  }
}

/** The user-facing form of a target, as passed to the environment */
export function cacheOptionOf(target: CacheTarget): CacheOption {
  switch (target.kind) {
    case 'disabled':
      return false
    case 'filesystem':
      return target.path
    case 'custom':
      return target.store
  }
}
