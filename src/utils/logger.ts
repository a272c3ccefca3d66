/**
 * Logger utility for the generation lifecycle
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/**
 * Paths scrubbed from every log line. Provider clients are configured with
 * API tokens that must never reach the logs.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiToken',
  'api_token',
  '*.apiToken',
  '*.api_token',
  'authorization',
  '*.authorization',
  'headers.authorization',
]

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Tests and library use stay quiet unless something goes wrong
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it out of tests and embedders
  return process.env.NODE_ENV === 'development'
}

/** Every logger handed out by createLogger, so a configured level reaches them all */
const createdLoggers = new Set<pino.Logger>()

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
    redact: PINO_REDACT_PATHS,
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

  if (pretty) {
    // pino-pretty is a devDependency; only use in non-production environments.
    return track(pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }))
  }

  return track(pino(baseOptions))
}

function track(instance: pino.Logger): pino.Logger {
  createdLoggers.add(instance)
  return instance
}

/**
 * Apply a log level to every logger created so far. The registry is
 * module-wide, so this re-levels loggers of every lifecycle in the process.
 * @param level - pino level name, e.g. "info"
 */
export function setLogLevel(level: string): void {
  for (const instance of createdLoggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('generation-lifecycle')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
