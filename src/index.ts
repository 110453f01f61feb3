/**
 * forumdb - Library Entry Point
 *
 * A synchronous accessor for a SQLite-backed forum store.
 *
 * @example
 * ```typescript
 * import { withForumDatabase } from 'forumdb';
 *
 * withForumDatabase({ path: './forum.db' }, (forum) => {
 *   const ada = forum.addUser('Ada', 'Lovelace', 'ada@example.com', 'hunter2');
 *   const tag = forum.addTag('News', null, '#ff0000');
 *   forum.addPost(ada, 'Hello', 'First post', null, [tag]);
 * });
 * ```
 *
 * @packageDocumentation
 */

export {
  ForumDatabase,
  openForumDatabase,
  withForumDatabase,
  openConnection,
  closeConnection,
  ensureSchema,
  getRequiredTables,
  getMissingTables,
  CredentialVerifier,
  SchemaValidationError,
  TABLES,
} from './database/index.js';

export type {
  ForumDatabaseOptions,
  OpenForumDatabaseOptions,
  ConnectionOptions,
  JournalMode,
  SchemaResult,
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
} from './database/index.js';

export {
  ForumError,
  ConfigError,
  ForeignKeyViolationError,
  UniqueConstraintViolationError,
  StoreUnavailableError,
  SchemaError,
  NotFoundError,
  ValidationError,
  formatError,
  getExitCode,
} from './errors/index.js';

export { loadConfig, getConfigValue, setConfigValue, listConfig, type Config } from './config/index.js';

export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/index.js';
