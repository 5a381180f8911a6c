/**
 * ConfigSystem implementation — loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config      (./.trellis/config.yaml)
 *     → environment vars    (TRELLIS_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'fs/promises'
import { join, resolve } from 'path'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { errorMessage, isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  PartialTrellisConfigSchema,
  TrellisConfigSchema,
  type PartialTrellisConfig,
  type TrellisConfig,
} from './config-schema.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { DEFAULT_CONFIG } from './defaults.js'

const logger = createLogger('config')

export const CONFIG_DIR_NAME = '.trellis'
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of TRELLIS_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  TRELLIS_DEBUG: 'environment.debug',
  TRELLIS_AUTO_RELOAD: 'environment.auto_reload',
  TRELLIS_STRICT_VARIABLES: 'environment.strict_variables',
  TRELLIS_CHARSET: 'environment.charset',
  TRELLIS_AUTOESCAPE: 'environment.autoescape',
  TRELLIS_OPTIMIZATIONS: 'environment.optimizations',
  TRELLIS_CACHE_TYPE: 'cache.type',
  TRELLIS_CACHE_PATH: 'cache.path',
  TRELLIS_LOG_LEVEL: 'log_level',
}

function coerce(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^-?\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialTrellisConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue

    const parts = configPath.split('.')
    const lastKey = parts.pop() ?? ''
    let cursor = overrides
    for (const part of parts) {
      const next = cursor[part]
      if (isPlainObject(next)) {
        cursor = next
      } else {
        const created: Record<string, unknown> = {}
        cursor[part] = created
        cursor = created
      }
    }
    cursor[lastKey] = coerce(rawValue)
  }

  const parsed = PartialTrellisConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: TrellisConfig | null = null
  private readonly _projectRoot: string
  private readonly _projectConfigDir: string
  private readonly _cliOverrides: PartialTrellisConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectRoot = resolve(options.projectRoot ?? process.cwd())
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : join(this._projectRoot, CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectRoot(): string {
    return this._projectRoot
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply project config if present
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, CONFIG_FILE_NAME))
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
    }

    // 3. Apply environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 4. Apply CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 5. Validate the merged config
    const result = TrellisConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ projectRoot: this._projectRoot }, 'Configuration loaded successfully')
  }

  getConfig(): TrellisConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialTrellisConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null
      }
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err: unknown) {
      throw new ConfigError(`Failed to parse config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }

    // An empty file is an empty overlay
    if (parsed === undefined || parsed === null) {
      return {}
    }

    const result = PartialTrellisConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
