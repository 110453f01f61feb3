/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.forumdb/
 * ├── forum.db        (SQLite database)
 * └── config.toml     (Configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const FORUMDB_DIR = join(homedir(), '.forumdb');
export const DB_PATH = join(FORUMDB_DIR, 'forum.db');
export const CONFIG_PATH = join(FORUMDB_DIR, 'config.toml');

/** SQLite's name for a private in-memory database */
export const IN_MEMORY = ':memory:';

/**
 * Expand a leading `~` to the user's home directory.
 * Other paths, including ':memory:', are returned unchanged.
 */
export function resolveDataPath(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
