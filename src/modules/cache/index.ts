export { NullArtifactStore, isArtifactStore } from './artifact-store.js'
export type { ArtifactStore } from './artifact-store.js'
export { FilesystemArtifactStore } from './filesystem-store.js'
export { SqliteArtifactStore, applyArtifactSchema } from './sqlite-store.js'
export type { SqliteArtifactStoreOptions } from './sqlite-store.js'
export { resolveCacheTarget, createArtifactStore, cacheOptionOf } from './cache-target.js'
export type { CacheOption, CacheTarget } from './cache-target.js'
