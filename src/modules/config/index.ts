/**
 * config module — barrel exports
 */

export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  ConfigSystemImpl,
  createConfigSystem,
  readEnvOverrides,
  ENV_VAR_MAP,
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
} from './config-system-impl.js'
export {
  TrellisConfigSchema,
  PartialTrellisConfigSchema,
  EnvironmentSettingsSchema,
  CacheSettingsSchema,
  LoaderSettingsSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  TrellisConfig,
  PartialTrellisConfig,
  EnvironmentSettings,
  CacheSettings,
  LoaderSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export {
  createEnvironmentFromConfig,
  createLoaderFromConfig,
  createCacheOption,
} from './environment-factory.js'
export type { EnvironmentFactoryOptions } from './environment-factory.js'
