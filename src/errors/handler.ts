/**
 * Error formatting for display and logs
 *
 * - Colored text output for terminals
 * - JSON output for programmatic use
 * - Verbose mode with stack traces
 */

import chalk from 'chalk';
import { ForumError } from './types.js';

/**
 * Options for error formatting
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Format an error for display.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof ForumError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        name: error.name,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red(`${error.name}: `) + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        name: error.name,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  // Strings, numbers, anything thrown that isn't an Error
  if (json) {
    return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the numeric code for an error.
 *
 * ForumError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ForumError) {
    return error.code;
  }
  return 1;
}
