/**
 * Database Connection Module
 *
 * Opens and closes the SQLite connection (better-sqlite3) behind a
 * ForumDatabase. There is no module-level singleton: the caller owns the
 * handle and releases it with closeConnection().
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { IN_MEMORY } from '../config/paths.js';
import { StoreUnavailableError } from '../errors/index.js';

export type JournalMode = 'wal' | 'delete' | 'truncate' | 'memory';

export interface ConnectionOptions {
  /** Journal mode for file databases (default 'wal') */
  journalMode?: JournalMode;
  /** How long a statement waits on a locked database, in ms (default 5000) */
  busyTimeoutMs?: number;
}

/**
 * Open a connection with forumdb's settings.
 *
 * Creates the parent directory of a file database on first use.
 *
 * @example
 * ```ts
 * const db = openConnection('/var/lib/forum/forum.db');
 * try {
 *   // ...
 * } finally {
 *   closeConnection(db);
 * }
 * ```
 *
 * @throws StoreUnavailableError if the file cannot be opened
 */
export function openConnection(path: string, options: ConnectionOptions = {}): Database.Database {
  const { journalMode = 'wal', busyTimeoutMs = 5000 } = options;
  const inMemory = path === IN_MEMORY;

  let db: Database.Database;
  try {
    if (!inMemory) {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path, { timeout: busyTimeoutMs });
  } catch (error) {
    throw new StoreUnavailableError(
      `Cannot open database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  // Cascades depend on this (OFF by default in SQLite!)
  db.pragma('foreign_keys = ON');

  // In-memory databases always use the memory journal
  if (!inMemory) {
    db.pragma(`journal_mode = ${journalMode.toUpperCase()}`);
  }

  return db;
}

/**
 * Close the connection.
 *
 * Safe to call multiple times.
 */
export function closeConnection(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
