/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export {
  createLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './logger.js';
