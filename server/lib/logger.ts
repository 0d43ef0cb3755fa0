/**
 * Leveled console logger for the server.
 * The threshold comes from `LOG_LEVEL` via `configureLogger`; `silent` mutes everything.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

let threshold: LogLevel = 'info'

export const configureLogger = (args: { level: LogLevel }) => {
  threshold = args.level
}

const enabled = (level: LogLevel) => levelRank[level] >= levelRank[threshold]

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) {
      console.debug('[DEBUG]', ...args)
    }
  },

  info: (...args: unknown[]) => {
    if (enabled('info')) {
      console.info('[INFO]', ...args)
    }
  },

  warn: (...args: unknown[]) => {
    if (enabled('warn')) {
      console.warn('[WARN]', ...args)
    }
  },

  error: (...args: unknown[]) => {
    if (enabled('error')) {
      console.error('[ERROR]', ...args)
    }
  },
}
