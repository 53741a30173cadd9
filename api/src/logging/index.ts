/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
} from './logger.js';
export type {
  LogContext,
  LoggerConfig,
  DriftLogMethods,
  StructuredLogger,
} from './logger.js';
