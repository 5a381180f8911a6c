/**
 * Zod validation schemas for the Trellis configuration file.
 *
 * Sections:
 *  - environment: flags passed to the template Environment
 *  - cache: where compiled templates are kept
 *  - loader: template directories and namespaces
 *  - log_level
 */

import { z } from 'zod'
import { ESCAPING_STRATEGIES } from '../extension/escaper-extension.js'

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

// ---------------------------------------------------------------------------
// Environment settings
// ---------------------------------------------------------------------------

export const AutoescapeSchema = z.union([z.enum(ESCAPING_STRATEGIES), z.literal(false)])
export type AutoescapeValue = z.infer<typeof AutoescapeSchema>

export const EnvironmentSettingsSchema = z
  .object({
    debug: z.boolean(),
    /** Defaults to the value of `debug` when omitted */
    auto_reload: z.boolean().optional(),
    strict_variables: z.boolean(),
    charset: z.string().min(1),
    autoescape: AutoescapeSchema,
    /** -1 = all optimizations, 0 = none */
    optimizations: z.union([z.literal(-1), z.literal(0)]),
  })
  .strict()

export type EnvironmentSettings = z.infer<typeof EnvironmentSettingsSchema>

// ---------------------------------------------------------------------------
// Cache settings
// ---------------------------------------------------------------------------

export const CacheTypeSchema = z.enum(['disabled', 'filesystem', 'sqlite'])
export type CacheType = z.infer<typeof CacheTypeSchema>

export const CacheSettingsSchema = z
  .object({
    type: CacheTypeSchema,
    /** Cache directory (filesystem) or database file (sqlite), relative to the project root */
    path: z.string().min(1).optional(),
  })
  .strict()
  .refine((cache) => cache.type === 'disabled' || cache.path !== undefined, {
    message: 'cache.path is required unless the cache is disabled',
    path: ['path'],
  })

export type CacheSettings = z.infer<typeof CacheSettingsSchema>

// ---------------------------------------------------------------------------
// Loader settings
// ---------------------------------------------------------------------------

export const LoaderSettingsSchema = z
  .object({
    /** Directories of the main namespace, relative to the project root */
    paths: z.array(z.string().min(1)),
    /** namespace → directories, addressed in templates as "@namespace/name" */
    namespaces: z.record(z.string().min(1), z.array(z.string().min(1))),
  })
  .strict()

export type LoaderSettings = z.infer<typeof LoaderSettingsSchema>

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const TrellisConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    environment: EnvironmentSettingsSchema,
    cache: CacheSettingsSchema,
    loader: LoaderSettingsSchema,
    log_level: LogLevelSchema,
  })
  .strict()

export type TrellisConfig = z.infer<typeof TrellisConfigSchema>

/** Shape accepted from a config file or an override layer: every key optional */
export const PartialTrellisConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    environment: EnvironmentSettingsSchema.partial().optional(),
    cache: z
      .object({ type: CacheTypeSchema.optional(), path: z.string().min(1).optional() })
      .strict()
      .optional(),
    loader: LoaderSettingsSchema.partial().optional(),
    log_level: LogLevelSchema.optional(),
  })
  .strict()

export type PartialTrellisConfig = z.infer<typeof PartialTrellisConfigSchema>
