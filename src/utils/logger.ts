/**
 * Logger utility for Trellis
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Loggers that follow the default level, retargeted by setDefaultLogLevel() */
const defaultLevelLoggers = new Set<pino.Logger>()

/** Level from the project configuration; LOG_LEVEL still wins */
let configuredLevel: string | undefined

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Library and CLI use without NODE_ENV stays quiet unless asked
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it to explicit development runs.
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  let instance: pino.Logger
  if (pretty) {
    // pino-pretty is a devDependency; only use in non-production environments.
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  } else {
    instance = pino(baseOptions)
  }

  if (options.level === undefined) {
    defaultLevelLoggers.add(instance)
  }
  return instance
}

/**
 * Change the level of every logger created without an explicit level.
 * Ignored while LOG_LEVEL is set.
 */
export function setDefaultLogLevel(level: string): void {
  configuredLevel = level
  if (process.env.LOG_LEVEL) return
  for (const instance of defaultLevelLoggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('trellis')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
