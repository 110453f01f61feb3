/**
 * Error type definitions for forumdb
 *
 * Every error thrown by the accessor is a ForumError carrying:
 * - a recovery hint for whoever reads the message
 * - a numeric code so callers can branch without string matching
 */

/**
 * Base class for all forumdb errors.
 */
export class ForumError extends Error {
  /** Recovery suggestion */
  public readonly hint?: string;

  /** Numeric error code (1-255) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ForumError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside their allowed range
 *
 * Code 2: Configuration error
 */
export class ConfigError extends ForumError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Check the [database], [logging] and [security] sections of config.toml', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a row references a parent row that does not exist.
 *
 * Code 3
 */
export class ForeignKeyViolationError extends ForumError {
  /** Table holding the referenced row (e.g. "Users"), when known */
  public readonly table?: string;
  /** Referencing column (e.g. "CreatorId"), when known */
  public readonly column?: string;
  /** Value that failed to resolve, when known */
  public readonly value?: number;

  constructor(reference: { table?: string; column?: string; value?: number } = {}, cause?: Error) {
    const { table, column, value } = reference;
    const subject = column === undefined ? 'A foreign key' : value === undefined ? column : `${column}=${value}`;
    super(
      `${subject} does not reference an existing row${table === undefined ? '' : ` in ${table}`}`,
      'Create the referenced row first or pass an existing id',
      3
    );
    this.name = 'ForeignKeyViolationError';
    this.table = table;
    this.column = column;
    this.value = value;
    this.cause = cause;
  }
}

/**
 * Thrown when a write would duplicate a unique column.
 *
 * Code 4
 */
export class UniqueConstraintViolationError extends ForumError {
  public readonly table: string;
  public readonly column: string;

  constructor(table: string, column: string, cause?: Error) {
    super(
      `${table}.${column} must be unique`,
      `A row with this ${column} already exists`,
      4
    );
    this.name = 'UniqueConstraintViolationError';
    this.table = table;
    this.column = column;
    this.cause = cause;
  }
}

/**
 * Thrown when the store cannot serve a request: connection closed,
 * file unopenable, database busy, I/O failure.
 *
 * Code 5: Database error
 */
export class StoreUnavailableError extends ForumError {
  /** The underlying store error */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check that the database file is reachable and not locked', 5);
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}

/**
 * Thrown when the required tables could not be created at startup.
 * The accessor is unusable after this.
 *
 * Code 5: Database error
 */
export class SchemaError extends ForumError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'The database file may be read-only or belong to another application', 5);
    this.name = 'SchemaError';
    this.cause = cause;
  }
}

/**
 * Thrown by keyed lookups and modifications on a missing row.
 *
 * Code 6
 */
export class NotFoundError extends ForumError {
  public readonly table: string;
  /** Column the lookup was keyed on ("Id" unless stated) */
  public readonly column: string;
  public readonly key: number | string;

  constructor(table: string, key: number | string, column: string = 'Id') {
    super(
      `No row in ${table} with ${column}=${key}`,
      `Check that the ${column === 'Id' ? 'id' : column.toLowerCase()} exists before reading or modifying it`,
      6
    );
    this.name = 'NotFoundError';
    this.table = table;
    this.column = column;
    this.key = key;
  }
}

/**
 * Thrown when operation input fails validation.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Code 1: General error
 */
export class ValidationError extends ForumError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
