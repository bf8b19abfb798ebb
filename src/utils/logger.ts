/**
 * Logger utility for Cadence
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Fields that must never reach a log sink */
export const REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.token',
  'password',
  '*.password',
]

/** Loggers that follow the level set by `setLogLevel` */
const followers = new Set<pino.Logger>()
let configuredLevel: string | undefined

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use): default to warn to avoid noise
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()
  const follows = options.level === undefined

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: REDACT_PATHS,
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
    // pino-pretty is a devDependency; only used outside production.
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

  if (follows) followers.add(instance)
  return instance
}

/**
 * Apply a configured level (`global.log_level`) to every logger created
 * without an explicit level. `LOG_LEVEL` in the environment still wins.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  configuredLevel = level
  for (const follower of followers) {
    follower.level = level
  }
}

/** Root application logger */
export const logger = createLogger('cadence')

/** Create a child logger with additional context */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
