/**
 * Namespaced console logger.
 *
 * Levels below the configured threshold are dropped. Structured data is
 * appended to the line as JSON.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  namespace: string
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
  child(namespace: string): Logger
}

export type LoggerOptions = {
  level?: LogLevel
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

/** Level from RECURRENCE_LOG_LEVEL, falling back to 'warn'. */
export function defaultLogLevel(): LogLevel {
  const fromEnv = (process.env.RECURRENCE_LOG_LEVEL ?? '').toLowerCase()
  return isLogLevel(fromEnv) ? fromEnv : 'warn'
}

function serialize(data: Record<string, unknown>): string {
  return JSON.stringify(data, (_key, value: unknown) => {
    if (value instanceof Error) return { name: value.name, message: value.message }
    return value
  })
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? defaultLogLevel()
  const threshold = LEVEL_ORDER[level]

  const formatMessage = (label: string, message: string, data?: Record<string, unknown>): string => {
    const prefix = `[${new Date().toISOString()}] [${label}] [${namespace}]`
    return data ? `${prefix} ${message} ${serialize(data)}` : `${prefix} ${message}`
  }

  return {
    namespace,
    debug(message, data) {
      if (threshold <= LEVEL_ORDER.debug) console.debug(formatMessage('DEBUG', message, data))
    },
    info(message, data) {
      if (threshold <= LEVEL_ORDER.info) console.info(formatMessage('INFO', message, data))
    },
    warn(message, data) {
      if (threshold <= LEVEL_ORDER.warn) console.warn(formatMessage('WARN', message, data))
    },
    error(message, data) {
      if (threshold <= LEVEL_ORDER.error) console.error(formatMessage('ERROR', message, data))
    },
    child(childNamespace) {
      return createLogger(`${namespace}:${childNamespace}`, { level })
    },
  }
}
