/**
 * Logging Module
 */

export {
  createLogger,
  formatLocalTimestamp,
  formatUtcOffset,
  type LoggerOptions,
  type OperationLogger,
} from './logger';
