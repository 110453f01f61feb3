/**
 * Database Module
 *
 * SQLite storage for the forum: users, posts, tags, comments and the
 * post-tag associations between them.
 *
 * @example
 * ```ts
 * import { openForumDatabase } from './database/index.js';
 *
 * const forum = openForumDatabase();
 * const userId = forum.addUser('Ada', 'Lovelace', 'ada@example.com', 'hunter2');
 * forum.close();
 * ```
 */

// Connection management (low-level)
export { openConnection, closeConnection, type ConnectionOptions, type JournalMode } from './connection.js';

// Schema manager
export { ensureSchema, getRequiredTables, getMissingTables, type SchemaResult } from './migrate.js';

// Record types
export type {
  User,
  Post,
  Tag,
  Comment,
  PostTag,
  TagRef,
  TableName,
  ModifyUserOptions,
  ModifyPostOptions,
  ModifyTagOptions,
  ModifyCommentOptions,
  CommentQueryOptions,
} from './schema.js';
export { TABLES } from './schema.js';

// Validation schemas and utilities
export {
  UserRowSchema,
  PostRowSchema,
  TagRowSchema,
  CommentRowSchema,
  PostTagRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  validateOptions,
} from './validation.js';

// Credentials
export { CredentialVerifier, DEFAULT_BCRYPT_ROUNDS } from './credentials.js';

// Store error translation
export { translateStoreError } from './errors.js';

// The accessor
export {
  ForumDatabase,
  openForumDatabase,
  withForumDatabase,
  type ForumDatabaseOptions,
  type OpenForumDatabaseOptions,
} from './operations.js';
