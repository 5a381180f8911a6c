/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PartialTrellisConfig, TrellisConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Project root; relative paths in the config resolve against it (default: cwd) */
  projectRoot?: string
  /** Path to the .trellis/ directory (default: <projectRoot>/.trellis) */
  projectConfigDir?: string
  /** Values that override everything, typically populated from CLI flags */
  cliOverrides?: PartialTrellisConfig
  /** Environment variables to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   * @throws {ConfigError} when a source or the merged result is invalid
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): TrellisConfig

  /** A single value by dot-notation key (e.g. "cache.type"); undefined when absent */
  get(key: string): unknown

  /** Absolute project root */
  readonly projectRoot: string

  readonly isLoaded: boolean
}
