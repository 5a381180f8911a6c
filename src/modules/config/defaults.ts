/**
 * Built-in default values for the Trellis configuration.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   project config → environment variables → CLI flags
 */

import type { TrellisConfig } from './config-schema.js'

export const DEFAULT_CONFIG: TrellisConfig = {
  config_format_version: '1',
  environment: {
    debug: false,
    strict_variables: false,
    charset: 'UTF-8',
    autoescape: 'html',
    optimizations: -1,
  },
  cache: {
    type: 'disabled',
  },
  loader: {
    paths: ['templates'],
    namespaces: {},
  },
  log_level: 'warn',
}
