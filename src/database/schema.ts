/**
 * Database Schema Types
 *
 * Record types returned by the accessor, one per table row, plus the
 * option shapes accepted by its modify operations.
 *
 * Records are frozen and expose exactly the columns of their table
 * (camel-cased). Timestamps are stored as ISO-8601 text and surfaced as
 * Date.
 */

import { ValidationError } from '../errors/index.js';

// ============================================================================
// Tables
// ============================================================================

export const TABLES = {
  users: 'Users',
  posts: 'Posts',
  tags: 'Tags',
  comments: 'Comments',
  postTags: 'PostTags',
} as const;

export type TableName = (typeof TABLES)[keyof typeof TABLES];

// ============================================================================
// Records
// ============================================================================

/**
 * A registered forum user.
 */
export interface User {
  readonly id: number;
  readonly firstName: string;
  readonly lastName: string;
  /** Unique across all users */
  readonly email: string;
  /** bcrypt hash of the password, never the plaintext */
  readonly password: string;
  readonly admin: boolean;
  readonly bio: string | null;
  readonly addedOn: Date;
}

/**
 * A post, owned by the user that created it.
 */
export interface Post {
  readonly id: number;
  /** Foreign key to Users.Id */
  readonly creatorId: number;
  readonly title: string;
  readonly content: string;
  readonly addedOn: Date;
  readonly expiresOn: Date | null;
}

export interface Tag {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
  readonly colour: string;
  readonly addedOn: Date;
}

/**
 * A comment on a post.
 *
 * `deletedOn` is set when the comment has been removed; such comments are
 * hidden from every read except `comments({ includeDeleted: true })`.
 */
export interface Comment {
  readonly id: number;
  /** Foreign key to Posts.Id */
  readonly postId: number;
  /** Foreign key to Users.Id (the author) */
  readonly userId: number;
  readonly content: string;
  readonly addedOn: Date;
  readonly editedOn: Date | null;
  readonly deletedOn: Date | null;
}

/**
 * One post-tag association. Identified by the (postId, tagId) pair.
 */
export interface PostTag {
  readonly postId: number;
  readonly tagId: number;
}

/**
 * A tag given either by id or as a record.
 */
export type TagRef = number | Pick<Tag, 'id'>;

// ============================================================================
// Modify options
//
// A key that is absent (or undefined) leaves its column unchanged.
// `null` is a value in its own right for nullable columns.
// ============================================================================

export interface ModifyUserOptions {
  firstName?: string;
  lastName?: string;
  email?: string;
  /** Plaintext; stored re-hashed */
  password?: string;
  admin?: boolean;
  bio?: string | null;
}

export interface ModifyPostOptions {
  title?: string;
  content?: string;
  expiresOn?: Date | null;
  /** Replaces the post's entire tag set */
  tags?: readonly TagRef[];
}

export interface ModifyTagOptions {
  name?: string;
  description?: string | null;
  colour?: string;
}

export interface ModifyCommentOptions {
  /** Also stamps editedOn */
  content?: string;
}

export interface CommentQueryOptions {
  /** Include soft-deleted comments (default false) */
  includeDeleted?: boolean;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Serialize a Date for storage.
 *
 * @throws ValidationError for an invalid Date
 */
export function toTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError('Invalid date', [`${String(date)} is not a valid point in time`]);
  }
  return date.toISOString();
}

/** Current time, serialized for storage */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Resolve tag references to distinct ids, keeping first-seen order.
 */
export function toTagIds(tags: readonly TagRef[]): number[] {
  return [...new Set(tags.map((tag) => (typeof tag === 'number' ? tag : tag.id)))];
}
