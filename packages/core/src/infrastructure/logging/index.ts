/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @module @kindling/core/infrastructure/logging
 * @license Apache-2.0
 */

export {
  LOG_LEVELS,
  type LogLevel,
  type LoggerOptions,
  isLogLevel,
  resolveLogLevel,
  formatMeta,
  createLogger,
  createContextLogger,
  getDefaultLogger,
} from './logger';
