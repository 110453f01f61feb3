/**
 * Test Utilities - In-memory forum
 *
 * Each call opens a fresh `:memory:` database, so tests never share
 * state. bcrypt runs at its minimum cost to keep suites fast.
 *
 * @example
 * ```typescript
 * import { createTestForum } from '../../test-utils/index.js';
 *
 * let forum: ForumDatabase;
 *
 * beforeEach(() => {
 *   forum = createTestForum();
 * });
 *
 * afterEach(() => {
 *   forum.close();
 * });
 * ```
 */

import { IN_MEMORY } from '../config/paths.js';
import { openConnection } from '../database/connection.js';
import { ForumDatabase } from '../database/operations.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** Lowest cost bcrypt accepts */
export const TEST_BCRYPT_ROUNDS = 4;

export function createTestForum(logger: Logger = silentLogger): ForumDatabase {
  return new ForumDatabase(openConnection(IN_MEMORY), { logger, bcryptRounds: TEST_BCRYPT_ROUNDS });
}

export type RecordedMessages = Record<'debug' | 'info' | 'warn' | 'error', string[]>;

/**
 * A logger that records every message by level.
 */
export function createRecordingLogger(): Logger & { messages: RecordedMessages } {
  const messages: RecordedMessages = { debug: [], info: [], warn: [], error: [] };
  return {
    messages,
    debug: (message: string) => messages.debug.push(message),
    info: (message: string) => messages.info.push(message),
    warn: (message: string) => messages.warn.push(message),
    error: (message: string) => messages.error.push(message),
  };
}
