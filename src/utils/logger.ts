/**
 * Logger utility
 *
 * Provides a consistent logging interface. There is no global logger:
 * every HistoricalCollection receives one at construction and hands it to
 * the functions it calls. Defaults to the noop logger, can be switched to
 * the console logger for development/debugging.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so every message is prefixed with a scope label
 *
 * @example
 * ```typescript
 * const log = scopedLogger(consoleLogger, 'contacts')
 * log.warn('dangling delta')  // [WARN] [contacts] dangling delta
 * ```
 */
export function scopedLogger(base: Logger, scope: string): Logger {
  const tag = `[${scope}]`
  return {
    debug: (message, ...args) => base.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => base.info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => base.warn(`${tag} ${message}`, ...args),
    error: (message, error, ...args) => base.error(`${tag} ${message}`, error, ...args),
  }
}
