/**
 * Shared setup for commands that need a template Environment: load the
 * project configuration and build the environment from it.
 */

import { ConfigError, TemplateError } from '../../core/errors.js'
import type { PartialTrellisConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createEnvironmentFromConfig } from '../../modules/config/environment-factory.js'
import type { Environment } from '../../modules/environment/environment.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger, setDefaultLogLevel } from '../../utils/logger.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
/** Template could not be loaded, compiled or rendered */
export const EXIT_ERROR = 1
/** Invalid configuration or arguments */
export const EXIT_INVALID = 2

export interface EnvironmentCommandOptions {
  /** Project root holding .trellis/config.yaml (default: cwd) */
  projectRoot?: string
  /** Overrides applied on top of the config file and TRELLIS_* variables */
  cliOverrides?: PartialTrellisConfig
}

export type EnvironmentResult =
  | { ok: true; env: Environment }
  | { ok: false; exitCode: number }

/**
 * Load configuration and create the environment, reporting failures on stderr.
 */
export async function loadEnvironment(opts: EnvironmentCommandOptions): Promise<EnvironmentResult> {
  const system = createConfigSystem({
    ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }),
    ...(opts.cliOverrides !== undefined && { cliOverrides: opts.cliOverrides }),
  })

  try {
    await system.load()
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return { ok: false, exitCode: EXIT_INVALID }
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return { ok: false, exitCode: EXIT_ERROR }
  }

  const config = system.getConfig()
  setDefaultLogLevel(config.log_level)

  try {
    return {
      ok: true,
      env: createEnvironmentFromConfig(config, { projectRoot: system.projectRoot }),
    }
  } catch (err: unknown) {
    process.stderr.write(`  Error creating environment: ${errorMessage(err)}\n`)
    return { ok: false, exitCode: err instanceof TemplateError ? EXIT_INVALID : EXIT_ERROR }
  }
}

/**
 * Report an error raised while loading or rendering a template.
 */
export function reportTemplateError(err: unknown): number {
  if (err instanceof TemplateError) {
    process.stderr.write(`  ${err.name}: ${err.message}\n`)
    logger.debug({ error: err.toJSON() }, 'Template error')
    return EXIT_ERROR
  }
  logger.error({ err }, 'Unexpected error')
  process.stderr.write(`  Error: ${errorMessage(err)}\n`)
  return EXIT_ERROR
}
