/**
 * Database Row Validation
 *
 * Zod schemas that validate rows read from SQLite and map them to the
 * frozen record types in schema.ts, plus schemas for modify options.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM Users WHERE Id = ?').get(id);
 * return validateRow(UserRowSchema, row, `Users.Id=${id}`);
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { ForumError, ValidationError } from '../errors/index.js';
import type { Comment, Post, PostTag, Tag, User } from './schema.js';

// ============================================================================
// Column types
// ============================================================================

const idColumn = z.number().int().positive();

/** ISO-8601 text -> Date */
const timestampColumn = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

const nullableTimestampColumn = timestampColumn.nullable();

/** SQLite has no boolean type; BOOL columns come back as 0/1 */
const booleanColumn = z
  .union([z.number().int(), z.boolean()])
  .nullable()
  .transform((value) => value !== null && value !== 0 && value !== false);

// ============================================================================
// Row Schemas
// ============================================================================

export const UserRowSchema = z
  .object({
    Id: idColumn,
    FirstName: z.string(),
    LastName: z.string(),
    Email: z.string(),
    Password: z.string(),
    Admin: booleanColumn,
    Bio: z.string().nullable(),
    AddedOn: timestampColumn,
  })
  .transform(
    (row): User =>
      Object.freeze({
        id: row.Id,
        firstName: row.FirstName,
        lastName: row.LastName,
        email: row.Email,
        password: row.Password,
        admin: row.Admin,
        bio: row.Bio,
        addedOn: row.AddedOn,
      })
  );

export const PostRowSchema = z
  .object({
    Id: idColumn,
    CreatorId: idColumn,
    Title: z.string(),
    Content: z.string(),
    AddedOn: timestampColumn,
    ExpiresOn: nullableTimestampColumn,
  })
  .transform(
    (row): Post =>
      Object.freeze({
        id: row.Id,
        creatorId: row.CreatorId,
        title: row.Title,
        content: row.Content,
        addedOn: row.AddedOn,
        expiresOn: row.ExpiresOn,
      })
  );

export const TagRowSchema = z
  .object({
    Id: idColumn,
    Name: z.string(),
    Description: z.string().nullable(),
    Colour: z.string(),
    AddedOn: timestampColumn,
  })
  .transform(
    (row): Tag =>
      Object.freeze({
        id: row.Id,
        name: row.Name,
        description: row.Description,
        colour: row.Colour,
        addedOn: row.AddedOn,
      })
  );

export const CommentRowSchema = z
  .object({
    Id: idColumn,
    PostId: idColumn,
    UserId: idColumn,
    Content: z.string(),
    AddedOn: timestampColumn,
    EditedOn: nullableTimestampColumn,
    DeletedOn: nullableTimestampColumn,
  })
  .transform(
    (row): Comment =>
      Object.freeze({
        id: row.Id,
        postId: row.PostId,
        userId: row.UserId,
        content: row.Content,
        addedOn: row.AddedOn,
        editedOn: row.EditedOn,
        deletedOn: row.DeletedOn,
      })
  );

export const PostTagRowSchema = z
  .object({
    PostId: idColumn,
    TagId: idColumn,
  })
  .transform((row): PostTag => Object.freeze({ postId: row.PostId, tagId: row.TagId }));

/** Stored credential only, for login checks */
export const PasswordRowSchema = z.object({ Password: z.string() });

/** Rows of sqlite_master */
export const TableNameRowSchema = z.object({ name: z.string() });

// ============================================================================
// Modify Option Schemas
//
// Strict: an unrecognized key is an error rather than silently ignored.
// ============================================================================

const tagRefSchema = z.union([idColumn, z.object({ id: idColumn }).passthrough()]);

export const ModifyUserOptionsSchema = z
  .object({
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    email: z.string().optional(),
    password: z.string().optional(),
    admin: z.boolean().optional(),
    bio: z.string().nullable().optional(),
  })
  .strict();

export const ModifyPostOptionsSchema = z
  .object({
    title: z.string().optional(),
    content: z.string().optional(),
    expiresOn: z.date().nullable().optional(),
    tags: z.array(tagRefSchema).optional(),
  })
  .strict();

export const ModifyTagOptionsSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().nullable().optional(),
    colour: z.string().optional(),
  })
  .strict();

export const ModifyCommentOptionsSchema = z
  .object({
    content: z.string().optional(),
  })
  .strict();

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * This indicates the file holds data this code does not understand:
 * rows written by another tool, or tables created with other columns.
 *
 * Code 5: Database error
 */
export class SchemaValidationError extends ForumError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe stored row does not match the forum schema.`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Context string for error messages (e.g., "Users.Id=3")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 * Throws on the first invalid row.
 *
 * @throws SchemaValidationError if validation fails
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}

/**
 * Validate caller-supplied operation options.
 *
 * @throws ValidationError listing every issue
 */
export function validateOptions<T extends z.ZodSchema>(
  schema: T,
  options: unknown,
  operation: string
): z.output<T> {
  const result = schema.safeParse(options);

  if (result.success) {
    return result.data;
  }

  throw new ValidationError(
    `Invalid options for ${operation}`,
    result.error.issues.map((issue) => `${issue.path.join('.') || '(options)'}: ${issue.message}`)
  );
}
