/**
 * Logging
 *
 * The engine writes to the console, as the rest of the code base does, but
 * through an injectable Logger so hosts can route output and tests can
 * silence or capture it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type Logger = {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function createConsoleLogger(level: LogLevel = 'info', prefix = '[streak-ledger]'): Logger {
  const threshold = RANK[level]

  function emit(
    at: Exclude<LogLevel, 'silent'>,
    write: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>,
  ) {
    if (RANK[at] < threshold) return
    if (context) write(`${prefix} ${message}`, context)
    else write(`${prefix} ${message}`)
  }

  return {
    debug: (message, context) => emit('debug', console.debug, message, context),
    info: (message, context) => emit('info', console.info, message, context),
    warn: (message, context) => emit('warn', console.warn, message, context),
    error: (message, context) => emit('error', console.error, message, context),
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
