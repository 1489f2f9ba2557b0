/**
 * @fileoverview Logging Exports
 * @module @tracewell/core/infrastructure/logging
 */

export { createLogger, REDACTED_PATHS } from './logger';
export type { Logger, LoggerOptions, LogLevel } from './logger';
