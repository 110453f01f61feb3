/**
 * Forum Database Operations
 *
 * ForumDatabase is the single gateway to the forum store. It wraps one
 * better-sqlite3 connection and exposes a fixed set of operations:
 * add / get / modify / remove / check for users, posts, tags and comments,
 * linkTag / unlinkTag for post-tag associations, and attemptLogin.
 *
 * Design:
 * - All calls are synchronous (better-sqlite3 is a blocking driver).
 * - Every multi-statement write runs in one BEGIN IMMEDIATE transaction.
 *   SQLite admits one writer at a time, so cascades are serializable.
 * - Cascades are carried by the schema's ON DELETE CASCADE foreign keys.
 * - Rows are validated with Zod on the way out (see validation.ts).
 */

import type Database from 'better-sqlite3';
import { loadConfig, type Config } from '../config/index.js';
import { ForeignKeyViolationError, NotFoundError } from '../errors/index.js';
import { createLogger, silentLogger, type Logger } from '../utils/logger.js';
import { closeConnection, openConnection } from './connection.js';
import { CredentialVerifier, DEFAULT_BCRYPT_ROUNDS } from './credentials.js';
import { translateStoreError } from './errors.js';
import { ensureSchema } from './migrate.js';
import {
  TABLES,
  now,
  toTagIds,
  toTimestamp,
  type Comment,
  type CommentQueryOptions,
  type ModifyCommentOptions,
  type ModifyPostOptions,
  type ModifyTagOptions,
  type ModifyUserOptions,
  type Post,
  type PostTag,
  type Tag,
  type TableName,
  type TagRef,
  type User,
} from './schema.js';
import {
  CommentRowSchema,
  ModifyCommentOptionsSchema,
  ModifyPostOptionsSchema,
  ModifyTagOptionsSchema,
  ModifyUserOptionsSchema,
  PasswordRowSchema,
  PostRowSchema,
  PostTagRowSchema,
  TagRowSchema,
  UserRowSchema,
  validateOptions,
  validateRow,
  validateRows,
} from './validation.js';

type SqlValue = string | number | null;

/** Soft-deleted comments are invisible to reads */
const LIVE_COMMENT = 'DeletedOn IS NULL';

export interface ForumDatabaseOptions {
  /** Defaults to a silent logger */
  logger?: Logger;
  /** bcrypt cost factor for new password hashes (default 10) */
  bcryptRounds?: number;
}

/**
 * The forum accessor.
 *
 * Construct once per process. The constructor enables foreign keys and
 * runs the schema manager; a SchemaError from it is fatal.
 *
 * @example
 * ```ts
 * const forum = new ForumDatabase(openConnection('forum.db'));
 * const userId = forum.addUser('Ada', 'Lovelace', 'ada@example.com', 'hunter2');
 * const postId = forum.addPost(userId, 'Hello', 'First post');
 * forum.close();
 * ```
 */
export class ForumDatabase {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly credentials: CredentialVerifier;

  constructor(db: Database.Database, options: ForumDatabaseOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? silentLogger;
    this.credentials = new CredentialVerifier(options.bcryptRounds ?? DEFAULT_BCRYPT_ROUNDS, this.logger);

    this.guard('initialize', () => this.db.pragma('foreign_keys = ON'));
    ensureSchema(this.db, this.logger);
  }

  /** False once close() has been called */
  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Release the connection. Safe to call more than once; every other
   * operation fails with StoreUnavailableError afterwards.
   */
  close(): void {
    if (this.db.open) {
      closeConnection(this.db);
      this.logger.debug?.('Database connection closed');
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Creation
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Register a user. The password is stored as a bcrypt hash.
   *
   * @returns The new user's id
   * @throws UniqueConstraintViolationError if the email is taken
   */
  addUser(firstName: string, lastName: string, email: string, password: string): number {
    const hashedPassword = this.credentials.hash(password);

    return this.guard('addUser', () => {
      const result = this.db
        .prepare('INSERT INTO Users (FirstName, LastName, Email, Password, AddedOn) VALUES (?, ?, ?, ?, ?)')
        .run(firstName, lastName, email, hashedPassword, now());

      const userId = Number(result.lastInsertRowid);
      this.logger.info?.(`Added user ${userId}`);
      return userId;
    });
  }

  /**
   * Create a post, optionally tagged. The post and all of its tag links
   * are written in one transaction.
   *
   * @returns The new post's id
   * @throws ForeignKeyViolationError if the creator or any tag does not exist
   */
  addPost(
    creatorId: number,
    title: string,
    content: string,
    expiresOn?: Date | null,
    tags?: readonly TagRef[]
  ): number {
    const expires = expiresOn ? toTimestamp(expiresOn) : null;
    const tagIds = tags ? toTagIds(tags) : [];

    return this.write('addPost', () => {
      this.requireParent(TABLES.users, 'CreatorId', creatorId);

      const result = this.db
        .prepare('INSERT INTO Posts (CreatorId, Title, Content, AddedOn, ExpiresOn) VALUES (?, ?, ?, ?, ?)')
        .run(creatorId, title, content, now(), expires);

      const postId = Number(result.lastInsertRowid);
      this.insertPostTags(postId, tagIds);

      this.logger.info?.(`Added post ${postId} by user ${creatorId} with ${tagIds.length} tag(s)`);
      return postId;
    });
  }

  /**
   * @returns The new tag's id
   */
  addTag(name: string, description: string | null, colour: string): number {
    return this.guard('addTag', () => {
      const result = this.db
        .prepare('INSERT INTO Tags (Name, Description, Colour, AddedOn) VALUES (?, ?, ?, ?)')
        .run(name, description, colour, now());

      const tagId = Number(result.lastInsertRowid);
      this.logger.info?.(`Added tag ${tagId}`);
      return tagId;
    });
  }

  /**
   * @returns The new comment's id
   * @throws ForeignKeyViolationError if the post or user does not exist
   */
  addComment(postId: number, userId: number, content: string): number {
    return this.write('addComment', () => {
      this.requireParent(TABLES.posts, 'PostId', postId);
      this.requireParent(TABLES.users, 'UserId', userId);

      const result = this.db
        .prepare('INSERT INTO Comments (PostId, UserId, Content, AddedOn) VALUES (?, ?, ?, ?)')
        .run(postId, userId, content, now());

      const commentId = Number(result.lastInsertRowid);
      this.logger.info?.(`Added comment ${commentId} on post ${postId}`);
      return commentId;
    });
  }

  /**
   * Associate a tag with a post. Linking a pair that is already linked
   * does nothing.
   *
   * @throws ForeignKeyViolationError if the post or tag does not exist
   */
  linkTag(postId: number, tagId: number): void {
    this.write('linkTag', () => {
      this.requireParent(TABLES.posts, 'PostId', postId);
      this.insertPostTags(postId, [tagId]);
      this.logger.info?.(`Linked tag ${tagId} to post ${postId}`);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Removal
  //
  // Removing an id that does not exist is a no-op.
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Delete a user together with their posts (and those posts' comments
   * and tag links) and every comment they wrote.
   */
  removeUser(userId: number): void {
    this.write('removeUser', () => {
      const posts = this.count('SELECT COUNT(*) AS count FROM Posts WHERE CreatorId = ?', userId);
      const result = this.db.prepare('DELETE FROM Users WHERE Id = ?').run(userId);

      if (result.changes > 0) {
        this.logger.info?.(`Removed user ${userId} and ${posts} post(s)`);
      }
    });
  }

  /**
   * Delete a post together with its comments and tag links.
   */
  removePost(postId: number): void {
    this.write('removePost', () => {
      const result = this.db.prepare('DELETE FROM Posts WHERE Id = ?').run(postId);

      if (result.changes > 0) {
        this.logger.info?.(`Removed post ${postId}`);
      }
    });
  }

  /**
   * Delete a tag, its links, and EVERY POST CARRYING THE TAG (with their
   * comments and remaining tag links).
   *
   * Use unlinkTag() to detach a tag without touching posts.
   */
  removeTag(tagId: number): void {
    this.write('removeTag', () => {
      const posts = this.db
        .prepare('DELETE FROM Posts WHERE Id IN (SELECT PostId FROM PostTags WHERE TagId = ?)')
        .run(tagId);
      const result = this.db.prepare('DELETE FROM Tags WHERE Id = ?').run(tagId);

      if (result.changes > 0) {
        this.logger.info?.(`Removed tag ${tagId} and ${posts.changes} tagged post(s)`);
      }
    });
  }

  /**
   * Soft-delete a comment: stamp deletedOn and hide it from reads.
   * Removing an already removed comment keeps the first timestamp.
   */
  removeComment(commentId: number): void {
    this.guard('removeComment', () => {
      const result = this.db
        .prepare(`UPDATE Comments SET DeletedOn = ? WHERE Id = ? AND ${LIVE_COMMENT}`)
        .run(now(), commentId);

      if (result.changes > 0) {
        this.logger.info?.(`Removed comment ${commentId}`);
      }
    });
  }

  /**
   * Detach a tag from a post. Neither row is deleted.
   */
  unlinkTag(postId: number, tagId: number): void {
    this.guard('unlinkTag', () => {
      const result = this.db.prepare('DELETE FROM PostTags WHERE PostId = ? AND TagId = ?').run(postId, tagId);

      if (result.changes > 0) {
        this.logger.info?.(`Unlinked tag ${tagId} from post ${postId}`);
      }
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Keyed reads
  //
  // Each throws NotFoundError for a missing id.
  // ─────────────────────────────────────────────────────────────────────────────

  getUser(userId: number): User {
    return this.guard('getUser', () => {
      const row = this.db.prepare('SELECT * FROM Users WHERE Id = ?').get(userId);
      if (!row) throw new NotFoundError(TABLES.users, userId);
      return validateRow(UserRowSchema, row, `Users.Id=${userId}`);
    });
  }

  /**
   * Look a user up by their (unique) email.
   *
   * @throws NotFoundError keyed by Email when no user has the email
   */
  getUserByEmail(email: string): User {
    return this.guard('getUserByEmail', () => {
      const row = this.db.prepare('SELECT * FROM Users WHERE Email = ?').get(email);
      if (!row) throw new NotFoundError(TABLES.users, email, 'Email');
      return validateRow(UserRowSchema, row, 'Users.Email');
    });
  }

  getPost(postId: number): Post {
    return this.guard('getPost', () => {
      const row = this.db.prepare('SELECT * FROM Posts WHERE Id = ?').get(postId);
      if (!row) throw new NotFoundError(TABLES.posts, postId);
      return validateRow(PostRowSchema, row, `Posts.Id=${postId}`);
    });
  }

  getTag(tagId: number): Tag {
    return this.guard('getTag', () => {
      const row = this.db.prepare('SELECT * FROM Tags WHERE Id = ?').get(tagId);
      if (!row) throw new NotFoundError(TABLES.tags, tagId);
      return validateRow(TagRowSchema, row, `Tags.Id=${tagId}`);
    });
  }

  /**
   * @throws NotFoundError for a missing or removed comment
   */
  getComment(commentId: number): Comment {
    return this.guard('getComment', () => {
      const row = this.db.prepare(`SELECT * FROM Comments WHERE Id = ? AND ${LIVE_COMMENT}`).get(commentId);
      if (!row) throw new NotFoundError(TABLES.comments, commentId);
      return validateRow(CommentRowSchema, row, `Comments.Id=${commentId}`);
    });
  }

  /**
   * Ids of the tags linked to a post, ascending.
   *
   * @throws NotFoundError if the post does not exist
   */
  getPostTags(postId: number): number[] {
    return this.guard('getPostTags', () => {
      if (!this.exists(TABLES.posts, postId)) throw new NotFoundError(TABLES.posts, postId);

      const rows = this.db.prepare('SELECT * FROM PostTags WHERE PostId = ? ORDER BY TagId').all(postId);
      return validateRows(PostTagRowSchema, rows, `PostTags.PostId=${postId}`).map((link) => link.tagId);
    });
  }

  // Single-field reads: the same value as the field of the full record

  getUserFirstName(userId: number): string {
    return this.getUser(userId).firstName;
  }

  getUserLastName(userId: number): string {
    return this.getUser(userId).lastName;
  }

  getUserEmail(userId: number): string {
    return this.getUser(userId).email;
  }

  /** The stored bcrypt hash */
  getUserPassword(userId: number): string {
    return this.getUser(userId).password;
  }

  getUserAdmin(userId: number): boolean {
    return this.getUser(userId).admin;
  }

  getUserBio(userId: number): string | null {
    return this.getUser(userId).bio;
  }

  getUserAddedOn(userId: number): Date {
    return this.getUser(userId).addedOn;
  }

  getPostCreatorId(postId: number): number {
    return this.getPost(postId).creatorId;
  }

  getPostTitle(postId: number): string {
    return this.getPost(postId).title;
  }

  getPostContent(postId: number): string {
    return this.getPost(postId).content;
  }

  getPostAddedOn(postId: number): Date {
    return this.getPost(postId).addedOn;
  }

  getPostExpiresOn(postId: number): Date | null {
    return this.getPost(postId).expiresOn;
  }

  getTagName(tagId: number): string {
    return this.getTag(tagId).name;
  }

  getTagDescription(tagId: number): string | null {
    return this.getTag(tagId).description;
  }

  getTagColour(tagId: number): string {
    return this.getTag(tagId).colour;
  }

  getTagAddedOn(tagId: number): Date {
    return this.getTag(tagId).addedOn;
  }

  getCommentPostId(commentId: number): number {
    return this.getComment(commentId).postId;
  }

  getCommentUserId(commentId: number): number {
    return this.getComment(commentId).userId;
  }

  getCommentContent(commentId: number): string {
    return this.getComment(commentId).content;
  }

  getCommentAddedOn(commentId: number): Date {
    return this.getComment(commentId).addedOn;
  }

  getCommentEditedOn(commentId: number): Date | null {
    return this.getComment(commentId).editedOn;
  }

  /** Always null: removed comments are not readable by id */
  getCommentDeletedOn(commentId: number): Date | null {
    return this.getComment(commentId).deletedOn;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Snapshots
  //
  // The only operations that read whole tables.
  // ─────────────────────────────────────────────────────────────────────────────

  users(): User[] {
    return this.guard('users', () =>
      validateRows(UserRowSchema, this.db.prepare('SELECT * FROM Users ORDER BY Id').all(), 'Users')
    );
  }

  posts(): Post[] {
    return this.guard('posts', () =>
      validateRows(PostRowSchema, this.db.prepare('SELECT * FROM Posts ORDER BY Id').all(), 'Posts')
    );
  }

  tags(): Tag[] {
    return this.guard('tags', () =>
      validateRows(TagRowSchema, this.db.prepare('SELECT * FROM Tags ORDER BY Id').all(), 'Tags')
    );
  }

  /**
   * All comments, excluding removed ones unless `includeDeleted` is set.
   */
  comments(options: CommentQueryOptions = {}): Comment[] {
    const where = options.includeDeleted ? '' : `WHERE ${LIVE_COMMENT}`;

    return this.guard('comments', () =>
      validateRows(CommentRowSchema, this.db.prepare(`SELECT * FROM Comments ${where} ORDER BY Id`).all(), 'Comments')
    );
  }

  postTags(): PostTag[] {
    return this.guard('postTags', () =>
      validateRows(
        PostTagRowSchema,
        this.db.prepare('SELECT * FROM PostTags ORDER BY PostId, TagId').all(),
        'PostTags'
      )
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Modification
  //
  // Only the options present are written. Each throws NotFoundError for a
  // missing id and ValidationError for unrecognized options.
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @throws UniqueConstraintViolationError if the new email is taken
   */
  modifyUser(userId: number, options: ModifyUserOptions): void {
    const update = validateOptions(ModifyUserOptionsSchema, options, 'modifyUser');
    const assignments: Record<string, SqlValue> = {};

    if (update.firstName !== undefined) assignments.FirstName = update.firstName;
    if (update.lastName !== undefined) assignments.LastName = update.lastName;
    if (update.email !== undefined) assignments.Email = update.email;
    if (update.password !== undefined) assignments.Password = this.credentials.hash(update.password);
    if (update.admin !== undefined) assignments.Admin = update.admin ? 1 : 0;
    if (update.bio !== undefined) assignments.Bio = update.bio;

    this.guard('modifyUser', () => {
      this.updateRow(TABLES.users, userId, assignments);
      this.logger.info?.(`Modified user ${userId} (${Object.keys(assignments).join(', ') || 'no changes'})`);
    });
  }

  /**
   * A `tags` option replaces the post's whole tag set; the column update
   * and the replacement commit together.
   *
   * @throws ForeignKeyViolationError if a new tag does not exist
   */
  modifyPost(postId: number, options: ModifyPostOptions): void {
    const update = validateOptions(ModifyPostOptionsSchema, options, 'modifyPost');
    const assignments: Record<string, SqlValue> = {};

    if (update.title !== undefined) assignments.Title = update.title;
    if (update.content !== undefined) assignments.Content = update.content;
    if (update.expiresOn !== undefined) {
      assignments.ExpiresOn = update.expiresOn === null ? null : toTimestamp(update.expiresOn);
    }

    this.write('modifyPost', () => {
      this.updateRow(TABLES.posts, postId, assignments);

      if (update.tags !== undefined) {
        const tagIds = toTagIds(update.tags);
        this.db.prepare('DELETE FROM PostTags WHERE PostId = ?').run(postId);
        this.insertPostTags(postId, tagIds);
        this.logger.info?.(`Replaced tags of post ${postId} with [${tagIds.join(', ')}]`);
      }

      this.logger.info?.(`Modified post ${postId}`);
    });
  }

  modifyTag(tagId: number, options: ModifyTagOptions): void {
    const update = validateOptions(ModifyTagOptionsSchema, options, 'modifyTag');
    const assignments: Record<string, SqlValue> = {};

    if (update.name !== undefined) assignments.Name = update.name;
    if (update.description !== undefined) assignments.Description = update.description;
    if (update.colour !== undefined) assignments.Colour = update.colour;

    this.guard('modifyTag', () => {
      this.updateRow(TABLES.tags, tagId, assignments);
      this.logger.info?.(`Modified tag ${tagId}`);
    });
  }

  /**
   * New content also stamps editedOn. Removed comments cannot be modified.
   */
  modifyComment(commentId: number, options: ModifyCommentOptions): void {
    const update = validateOptions(ModifyCommentOptionsSchema, options, 'modifyComment');
    const assignments: Record<string, SqlValue> = {};

    if (update.content !== undefined) {
      assignments.Content = update.content;
      assignments.EditedOn = now();
    }

    this.guard('modifyComment', () => {
      this.updateRow(TABLES.comments, commentId, assignments, LIVE_COMMENT);
      this.logger.info?.(`Modified comment ${commentId}`);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Existence checks
  // ─────────────────────────────────────────────────────────────────────────────

  checkUserExists(userId: number): boolean {
    return this.guard('checkUserExists', () => this.exists(TABLES.users, userId));
  }

  checkPostExists(postId: number): boolean {
    return this.guard('checkPostExists', () => this.exists(TABLES.posts, postId));
  }

  checkTagExists(tagId: number): boolean {
    return this.guard('checkTagExists', () => this.exists(TABLES.tags, tagId));
  }

  /** False for removed comments */
  checkCommentExists(commentId: number): boolean {
    return this.guard('checkCommentExists', () => this.exists(TABLES.comments, commentId, LIVE_COMMENT));
  }

  checkPostTagExists(postId: number, tagId: number): boolean {
    return this.guard('checkPostTagExists', () => this.hasLink(postId, tagId));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Credentials
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Check an email/password pair.
   *
   * An unknown email and a wrong password are indistinguishable: both
   * return false after one bcrypt comparison. A successful login re-hashes
   * a credential stored at another cost, so every hash converges on the
   * configured bcrypt_rounds.
   */
  attemptLogin(email: string, password: string): boolean {
    const storedHash = this.guard('attemptLogin', () => {
      const row = this.db.prepare('SELECT Password FROM Users WHERE Email = ?').get(email);
      return row === undefined ? undefined : validateRow(PasswordRowSchema, row, 'Users.Email').Password;
    });

    const accepted = this.credentials.verify(password, storedHash);
    this.logger.debug?.(`Login attempt ${accepted ? 'accepted' : 'rejected'}`);

    if (accepted && storedHash !== undefined && this.credentials.needsRehash(storedHash)) {
      const rehashed = this.credentials.hash(password);
      this.guard('attemptLogin', () =>
        this.db.prepare('UPDATE Users SET Password = ? WHERE Email = ?').run(rehashed, email)
      );
      this.logger.debug?.(`Re-hashed a credential at cost ${this.credentials.rounds}`);
    }

    return accepted;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run fn, translating driver errors into the forumdb taxonomy.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw translateStoreError(error, operation);
    }
  }

  /**
   * Run fn in a BEGIN IMMEDIATE transaction. Any throw rolls the whole
   * transaction back before the translated error reaches the caller.
   */
  private write<T>(operation: string, fn: () => T): T {
    return this.guard(operation, () => this.db.transaction(fn).immediate());
  }

  private exists(table: TableName, id: number, condition?: string): boolean {
    const where = condition ? `Id = ? AND ${condition}` : 'Id = ?';
    return this.db.prepare(`SELECT 1 FROM ${table} WHERE ${where}`).get(id) !== undefined;
  }

  private hasLink(postId: number, tagId: number): boolean {
    return (
      this.db.prepare('SELECT 1 FROM PostTags WHERE PostId = ? AND TagId = ?').get(postId, tagId) !== undefined
    );
  }

  private count(sql: string, ...params: SqlValue[]): number {
    const row = this.db.prepare(sql).get(...params);
    return row !== null && typeof row === 'object' && 'count' in row && typeof row.count === 'number'
      ? row.count
      : 0;
  }

  /**
   * @throws ForeignKeyViolationError naming the missing parent
   */
  private requireParent(table: TableName, column: string, id: number): void {
    if (!this.exists(table, id)) {
      throw new ForeignKeyViolationError({ table, column, value: id });
    }
  }

  /**
   * Link each tag to the post, skipping pairs that are already linked.
   * Callers wrap this in a transaction.
   */
  private insertPostTags(postId: number, tagIds: readonly number[]): void {
    const insert = this.db.prepare('INSERT INTO PostTags (PostId, TagId) VALUES (?, ?)');

    for (const tagId of tagIds) {
      this.requireParent(TABLES.tags, 'TagId', tagId);
      if (!this.hasLink(postId, tagId)) {
        insert.run(postId, tagId);
      }
    }
  }

  /**
   * UPDATE the given columns of one row.
   *
   * @throws NotFoundError if no row matches (with or without assignments)
   */
  private updateRow(
    table: TableName,
    id: number,
    assignments: Record<string, SqlValue>,
    condition?: string
  ): void {
    const columns = Object.keys(assignments);

    if (columns.length === 0) {
      if (!this.exists(table, id, condition)) throw new NotFoundError(table, id);
      return;
    }

    const sets = columns.map((column) => `${column} = @${column}`).join(', ');
    const where = condition ? `Id = @id AND ${condition}` : 'Id = @id';
    const result = this.db.prepare(`UPDATE ${table} SET ${sets} WHERE ${where}`).run({ ...assignments, id });

    if (result.changes === 0) {
      throw new NotFoundError(table, id);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Lifecycle helpers
// ─────────────────────────────────────────────────────────────────────────────

export interface OpenForumDatabaseOptions {
  /** Database file; overrides config.database.path */
  path?: string;
  /** Use this config instead of loading config.toml */
  config?: Config;
  /** Config file to load when `config` is not given */
  configPath?: string;
  /** Overrides the logger built from config.logging.level */
  logger?: Logger;
}

/**
 * Open the database described by the config and return a ready accessor.
 *
 * The caller owns the result and must call close() on shutdown; prefer
 * withForumDatabase() when the work fits in one callback.
 */
export function openForumDatabase(options: OpenForumDatabaseOptions = {}): ForumDatabase {
  const config = options.config ?? loadConfig({ configPath: options.configPath });
  const logger = options.logger ?? createLogger('Database', config.logging.level);
  const path = options.path ?? config.database.path;

  const db = openConnection(path, {
    journalMode: config.database.journal_mode,
    busyTimeoutMs: config.database.busy_timeout_ms,
  });

  try {
    const forum = new ForumDatabase(db, { logger, bcryptRounds: config.security.bcrypt_rounds });
    logger.debug?.(`Opened forum database at ${path}`);
    return forum;
  } catch (error) {
    closeConnection(db);
    throw error;
  }
}

/**
 * Open the database, run fn with it, and close it again whatever fn does.
 *
 * @example
 * ```ts
 * const titles = withForumDatabase({ path: 'forum.db' }, (forum) =>
 *   forum.posts().map((post) => post.title)
 * );
 * ```
 */
export function withForumDatabase<T>(
  options: OpenForumDatabaseOptions,
  fn: (forum: ForumDatabase) => T
): T {
  const forum = openForumDatabase(options);
  try {
    return fn(forum);
  } finally {
    forum.close();
  }
}
