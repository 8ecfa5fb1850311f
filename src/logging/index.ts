/**
 * Logging exports.
 */

export { logger, configureLogging, resetLogging } from './logger.js'
export type { Logger } from './logger.js'
