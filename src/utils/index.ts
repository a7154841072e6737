/**
 * symdoc - Utilities Module
 * @module utils
 */

// Error handling
export {
  SymdocError,
  MissingFileError,
  FormatError,
  StoreError,
  EmptyResultError,
  ErrorCodes,
  isSymdocError,
  wrapError,
  type ErrorCode,
  type FormatErrorCode,
} from './errors.js';

// Logging
export {
  Logger,
  logger,
  createLogger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
  type ScopedLogger,
} from './logger.js';

// Path utilities
export { isIncludeFragment, isDirectory } from './paths.js';
