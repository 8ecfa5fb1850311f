/**
 * Pluggable logging.
 *
 * The package never writes to the console directly; it goes through the active Logger.
 * Applications route package logs into their own logging stack with configureLogging().
 */

/**
 * Minimal logger interface. Any object with these four methods works,
 * including `console` and most structured loggers.
 */
export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

/**
 * Default logger: warnings and errors go to the console, debug and info are dropped.
 */
const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
}

let activeLogger: Logger = defaultLogger

/**
 * Replaces the logger used by the package.
 *
 * @param customLogger - Logger to use from now on
 *
 * @example
 * ```typescript
 * configureLogging(console) // log everything, including debug output
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  activeLogger = customLogger
}

/**
 * Restores the default console logger.
 */
export function resetLogging(): void {
  activeLogger = defaultLogger
}

/**
 * Package-wide logger that forwards to whichever logger is active.
 */
export const logger: Logger = {
  debug: (...args) => activeLogger.debug(...args),
  info: (...args) => activeLogger.info(...args),
  warn: (...args) => activeLogger.warn(...args),
  error: (...args) => activeLogger.error(...args),
}
