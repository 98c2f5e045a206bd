export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Least to most severe. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

type LogMethod = (message: string, ...args: unknown[]) => void

export type Logger = Record<LogLevel, LogMethod>

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export function basicLogger(): Logger {
  return console
}

function mapLevels(method: (level: LogLevel) => LogMethod): Logger {
  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  }
}

export function prefixedLogger(prefix: string, base: Logger = basicLogger()): Logger {
  return mapLevels((level) => (message, ...args) => base[level](`[${prefix}] ${message}`, ...args))
}

/** Drops messages below `threshold`; errors always pass. */
export function filteredLogger(threshold: LogLevel, base: Logger = basicLogger()): Logger {
  const floor = LOG_LEVELS.indexOf(threshold)
  return mapLevels((level) =>
    LOG_LEVELS.indexOf(level) >= floor ? (message, ...args) => base[level](message, ...args) : () => {},
  )
}
