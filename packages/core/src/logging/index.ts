/**
 * @fileoverview Logging exports
 */

export {
  TaskLogger,
  getLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
