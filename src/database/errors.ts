/**
 * Store error translation
 *
 * better-sqlite3 reports failures as SqliteError (with an extended
 * result code such as SQLITE_CONSTRAINT_UNIQUE) or, once the connection
 * is closed, as a TypeError. This maps both onto the forumdb taxonomy.
 */

import Database from 'better-sqlite3';
import {
  ForeignKeyViolationError,
  ForumError,
  StoreUnavailableError,
  UniqueConstraintViolationError,
  ValidationError,
} from '../errors/index.js';

/** "UNIQUE constraint failed: Users.Email" */
const UNIQUE_DETAIL = /constraint failed: (\w+)\.(\w+)/;

/**
 * Translate anything thrown by the driver into a ForumError.
 *
 * ForumErrors pass through unchanged. Errors that are not store
 * failures (programming errors) are returned as they are.
 */
export function translateStoreError(error: unknown, operation: string): Error {
  if (error instanceof ForumError) {
    return error;
  }

  if (error instanceof Database.SqliteError) {
    switch (error.code) {
      case 'SQLITE_CONSTRAINT_UNIQUE':
      case 'SQLITE_CONSTRAINT_PRIMARYKEY': {
        const match = UNIQUE_DETAIL.exec(error.message);
        return new UniqueConstraintViolationError(match?.[1] ?? 'unknown', match?.[2] ?? 'unknown', error);
      }
      case 'SQLITE_CONSTRAINT_FOREIGNKEY':
        return new ForeignKeyViolationError({}, error);
      default:
        if (error.code.startsWith('SQLITE_CONSTRAINT')) {
          return new ValidationError(`${operation} violates a constraint`, [error.message]);
        }
        return new StoreUnavailableError(`${operation} failed: ${error.message} (${error.code})`, error);
    }
  }

  if (error instanceof TypeError && /connection is not open/i.test(error.message)) {
    return new StoreUnavailableError(`${operation} failed: the database connection is closed`, error);
  }

  return error instanceof Error ? error : new Error(String(error));
}
