/**
 * Logger factory: structured pino loggers, one per component.
 */
import pino from 'pino'

export type LoggerOptions = {
  level?: string
}

export function createLogger(name: string, options: LoggerOptions = {}) {
  return pino({
    name,
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

export type Logger = ReturnType<typeof createLogger>

/** Logger that drops everything; for tests and embedding without output. */
export function createSilentLogger(): Logger {
  return createLogger('silent', { level: 'silent' })
}
