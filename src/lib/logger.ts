/**
 * Leveled logging to stderr (pino)
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions as PinoLoggerOptions } from 'pino'
import pinoPretty from 'pino-pretty'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'
export type LogFormat = 'json' | 'pretty'

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

export interface LoggerOptions {
  level?: LogLevel
  name?: string
  format?: LogFormat
  bindings?: Record<string, unknown>
  /** Write records here instead of stderr; format is then ignored */
  destination?: DestinationStream
}

export type { Logger }

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) {
    return err
  }
  return {
    ...err,
    name: err.name,
    message: err.message,
    stack: err.stack,
  }
}

/**
 * Create a logger writing to stderr, so stdout carries only the report
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'warn', name = 'reconmap', format = 'pretty', bindings = {} } = options

  const config: PinoLoggerOptions = {
    name,
    level,
    serializers: {
      err: serializeError,
      error: serializeError,
    },
  }

  const destination = options.destination ?? (format === 'pretty'
    ? pinoPretty({
      colorize: true,
      destination: 2,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      sync: true,
    })
    : pino.destination({ dest: 2, sync: true }))

  const logger = pino(config, destination)
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger
}

/**
 * A logger that drops everything; the default for library calls
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Map repeated -v flags to a level: 0 -> warn, 1 -> info, 2 -> debug, 3+ -> trace
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return 'warn'
  if (verbosity === 1) return 'info'
  if (verbosity === 2) return 'debug'
  return 'trace'
}
