/**
 * Error handling module for forumdb
 *
 * This module exports:
 * - Error classes for the store's failure modes
 * - Error formatting utilities
 *
 * Usage:
 *   import { NotFoundError, formatError } from './errors/index.js';
 *
 *   throw new NotFoundError('Users', 42);
 */

// Error types
export {
  ForumError,
  ConfigError,
  ForeignKeyViolationError,
  UniqueConstraintViolationError,
  StoreUnavailableError,
  SchemaError,
  NotFoundError,
  ValidationError,
} from './types.js';

// Formatting utilities
export {
  formatError,
  getExitCode,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
