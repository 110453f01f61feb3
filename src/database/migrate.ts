/**
 * Schema Manager
 *
 * Makes sure the five forum tables exist. Additive only: tables that are
 * already present are never dropped or altered, missing ones are created
 * from the definitions below.
 */

import type Database from 'better-sqlite3';
import { ForumError, SchemaError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { TABLES, type TableName } from './schema.js';
import { TableNameRowSchema, validateRows } from './validation.js';

/**
 * Result of ensureSchema().
 */
export interface SchemaResult {
  /** Required tables that were already present */
  existing: TableName[];
  /** Required tables created by this call */
  created: TableName[];
}

// ============================================================================
// Table Definitions
// ============================================================================

// Ordered parents first.
const TABLE_DEFINITIONS: ReadonlyArray<{ name: TableName; sql: string }> = [
  {
    name: TABLES.users,
    sql: `
CREATE TABLE IF NOT EXISTS Users (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  FirstName TEXT NOT NULL,
  LastName TEXT NOT NULL,
  Email TEXT NOT NULL UNIQUE,
  Password TEXT NOT NULL,
  Admin BOOL DEFAULT FALSE,
  Bio TEXT,
  AddedOn DATETIME NOT NULL
);
    `.trim(),
  },
  {
    name: TABLES.posts,
    sql: `
CREATE TABLE IF NOT EXISTS Posts (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  CreatorId INTEGER NOT NULL,
  Title TEXT NOT NULL,
  Content TEXT NOT NULL,
  AddedOn DATETIME NOT NULL,
  ExpiresOn DATETIME,
  FOREIGN KEY (CreatorId) REFERENCES Users(Id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_posts_creator ON Posts(CreatorId);
    `.trim(),
  },
  {
    name: TABLES.tags,
    sql: `
CREATE TABLE IF NOT EXISTS Tags (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  Name TEXT NOT NULL,
  Description TEXT,
  Colour TEXT NOT NULL,
  AddedOn DATETIME NOT NULL
);
    `.trim(),
  },
  {
    name: TABLES.comments,
    sql: `
CREATE TABLE IF NOT EXISTS Comments (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  PostId INTEGER NOT NULL,
  UserId INTEGER NOT NULL,
  Content TEXT NOT NULL,
  AddedOn DATETIME NOT NULL,
  EditedOn DATETIME,
  DeletedOn DATETIME,
  FOREIGN KEY (PostId) REFERENCES Posts(Id) ON DELETE CASCADE,
  FOREIGN KEY (UserId) REFERENCES Users(Id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_comments_post ON Comments(PostId);
CREATE INDEX IF NOT EXISTS idx_comments_user ON Comments(UserId);
    `.trim(),
  },
  {
    name: TABLES.postTags,
    sql: `
-- One row per (post, tag) pair
CREATE TABLE IF NOT EXISTS PostTags (
  PostId INTEGER NOT NULL,
  TagId INTEGER NOT NULL,
  PRIMARY KEY (PostId, TagId),
  FOREIGN KEY (PostId) REFERENCES Posts(Id) ON DELETE CASCADE,
  FOREIGN KEY (TagId) REFERENCES Tags(Id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_post_tags_tag ON PostTags(TagId);
    `.trim(),
  },
];

/**
 * Names of the tables the accessor needs, parents first.
 */
export function getRequiredTables(): TableName[] {
  return TABLE_DEFINITIONS.map((definition) => definition.name);
}

function listTables(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table'").all();
  return new Set(validateRows(TableNameRowSchema, rows, 'sqlite_master').map((row) => row.name));
}

/**
 * Required tables that do not exist yet.
 */
export function getMissingTables(db: Database.Database): TableName[] {
  const present = listTables(db);
  return getRequiredTables().filter((name) => !present.has(name));
}

/**
 * Create any missing forum tables.
 *
 * Runs all creations in one transaction. Safe to call repeatedly.
 *
 * @throws SchemaError if the tables cannot be inspected or created
 *
 * @example
 * ```ts
 * const { created } = ensureSchema(db, logger);
 * if (created.length > 0) logger.info?.(`Created ${created.join(', ')}`);
 * ```
 */
export function ensureSchema(db: Database.Database, logger: Logger = silentLogger): SchemaResult {
  try {
    const present = listTables(db);
    const existing = getRequiredTables().filter((name) => present.has(name));
    const missing = TABLE_DEFINITIONS.filter((definition) => !present.has(definition.name));

    logger.debug?.(`Checking that the tables exist (found: ${existing.join(', ') || 'none'})`);

    if (missing.length === 0) {
      return { existing, created: [] };
    }

    db.transaction(() => {
      for (const definition of missing) {
        // A partially populated file means something dropped a table
        if (existing.length > 0) {
          logger.warn(`${definition.name} table does not exist in the database. Recreating it.`);
        }
        db.exec(definition.sql);
      }
    })();

    const created = missing.map((definition) => definition.name);
    logger.debug?.(`Created tables: ${created.join(', ')}`);
    return { existing, created };
  } catch (error) {
    if (error instanceof ForumError) {
      throw error;
    }
    const cause = error instanceof Error ? error : undefined;
    throw new SchemaError(`Could not create the forum schema: ${cause?.message ?? String(error)}`, cause);
  }
}
