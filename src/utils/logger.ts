/**
 * Logger Interface for Library Code
 *
 * The accessor and schema manager accept a Logger via dependency
 * injection. Applications pass createLogger() output, tests pass
 * silentLogger or a vi.fn()-backed mock.
 */

import chalk from 'chalk';

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
  /** Log an informational message */
  info?: (message: string) => void;
  /** Log an error message */
  error?: (message: string) => void;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Create a console logger for one component.
 *
 * Messages are prefixed with the scope and dropped when below `level`.
 *
 * @example
 * ```ts
 * const logger = createLogger('Database', 'debug');
 * logger.info?.('Added user 3');   // [Database] Added user 3
 * ```
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level];
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_RANK[messageLevel] >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug: (message: string) => {
      if (enabled('debug')) console.log(chalk.dim(`${prefix} ${message}`));
    },
    info: (message: string) => {
      if (enabled('info')) console.log(`${chalk.cyan(prefix)} ${message}`);
    },
    warn: (message: string) => {
      if (enabled('warn')) console.warn(chalk.yellow(`${prefix} Warning: ${message}`));
    },
    error: (message: string) => {
      if (enabled('error')) console.error(chalk.red(`${prefix} Error: ${message}`));
    },
  };
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
  info: () => {},
  error: () => {},
};
