/**
 * createEnvironmentFromConfig — builds a template Environment from a loaded
 * configuration.
 */

import { resolve } from 'path'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { CacheOption } from '../cache/cache-target.js'
import { SqliteArtifactStore } from '../cache/sqlite-store.js'
import { Environment } from '../environment/environment.js'
import { FilesystemLoader } from '../loader/filesystem-loader.js'
import type { CacheSettings, TrellisConfig } from './config-schema.js'

export interface EnvironmentFactoryOptions {
  /** Base for relative paths in the config */
  projectRoot: string
  eventBus?: TypedEventBus
}

export function createCacheOption(cache: CacheSettings, projectRoot: string): CacheOption {
  if (cache.type === 'disabled' || cache.path === undefined) {
    return false
  }
  const path = resolve(projectRoot, cache.path)
  return cache.type === 'sqlite' ? new SqliteArtifactStore(path) : path
}

export function createLoaderFromConfig(
  loader: TrellisConfig['loader'],
  projectRoot: string
): FilesystemLoader {
  const fsLoader = new FilesystemLoader(loader.paths, projectRoot)
  for (const [namespace, paths] of Object.entries(loader.namespaces)) {
    fsLoader.setPaths(paths, namespace)
  }
  return fsLoader
}

export function createEnvironmentFromConfig(
  config: TrellisConfig,
  options: EnvironmentFactoryOptions
): Environment {
  const settings = config.environment
  return new Environment(createLoaderFromConfig(config.loader, options.projectRoot), {
    debug: settings.debug,
    autoReload: settings.auto_reload,
    strictVariables: settings.strict_variables,
    charset: settings.charset,
    autoescape: settings.autoescape,
    optimizations: settings.optimizations,
    cache: createCacheOption(config.cache, options.projectRoot),
    eventBus: options.eventBus,
  })
}
