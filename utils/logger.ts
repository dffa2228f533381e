/**
 * Logger utility for dualpath
 *
 * Provides a simple logger factory that creates namespaced loggers
 * for the binding layer and the CLI.
 */

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

/**
 * Check whether debug output is switched on.
 * Enable by setting DUALPATH_DEBUG=1.
 */
export function isDebugEnabled(): boolean {
  return typeof process !== 'undefined' && Boolean(process.env?.DUALPATH_DEBUG)
}

/**
 * Create a namespaced logger instance.
 *
 * @param prefix - Prefix to prepend to all log messages (e.g., '[dualpath-cli]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('[dualpath-cli]')
 * logger.info('Starting up...')  // [dualpath-cli] Starting up...
 * logger.error('Fatal error:', err)
 * ```
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
    debug: (...args: unknown[]) => {
      if (isDebugEnabled()) {
        console.debug(prefix, ...args)
      }
    },
  }
}

/**
 * Default logger instance with [dualpath] prefix
 */
export const logger: Logger = createLogger('[dualpath]')
