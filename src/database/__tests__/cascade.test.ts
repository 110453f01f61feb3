/**
 * Cascade Tests
 *
 * Removing a parent row removes everything that depends on it, in one
 * transaction. Removing a missing id does nothing.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type Database from 'better-sqlite3';

import { createTestForum, TEST_BCRYPT_ROUNDS } from '../../test-utils/index.js';
import { openConnection } from '../connection.js';
import { ForumDatabase } from '../operations.js';
import { ValidationError } from '../../errors/index.js';

describe('cascading removal', () => {
  let forum: ForumDatabase;

  beforeEach(() => {
    forum = createTestForum();
  });

  afterEach(() => {
    forum.close();
  });

  it('removePost keeps the author but drops comments', () => {
    expect(forum.addUser('A', 'B', 'a@x.com', 'pw')).toBe(1);
    expect(forum.addPost(1, 'T', 'C')).toBe(1);
    expect(forum.addComment(1, 1, 'hi')).toBe(1);

    forum.removePost(1);

    expect(forum.checkCommentExists(1)).toBe(false);
    expect(forum.checkPostExists(1)).toBe(false);
    expect(forum.checkUserExists(1)).toBe(true);
  });

  it('removePost drops the post tag links but not the tags', () => {
    const userId = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const tagId = forum.addTag('News', null, '#ff0000');
    const postId = forum.addPost(userId, 'T', 'C', null, [tagId]);

    forum.removePost(postId);

    expect(forum.postTags()).toEqual([]);
    expect(forum.checkTagExists(tagId)).toBe(true);
  });

  it('removeUser drops their posts and every comment on them', () => {
    const author = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const reader = forum.addUser('C', 'D', 'c@x.com', 'pw');
    const postId = forum.addPost(author, 'T', 'C');
    const byAuthor = forum.addComment(postId, author, 'mine');
    const byReader = forum.addComment(postId, reader, 'yours');

    forum.removeUser(author);

    expect(forum.checkUserExists(author)).toBe(false);
    expect(forum.checkPostExists(postId)).toBe(false);
    expect(forum.checkCommentExists(byAuthor)).toBe(false);
    expect(forum.checkCommentExists(byReader)).toBe(false);
    expect(forum.checkUserExists(reader)).toBe(true);
  });

  it('removeUser drops their comments on other posts', () => {
    const author = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const reader = forum.addUser('C', 'D', 'c@x.com', 'pw');
    const postId = forum.addPost(author, 'T', 'C');
    const commentId = forum.addComment(postId, reader, 'yours');

    forum.removeUser(reader);

    expect(forum.checkCommentExists(commentId)).toBe(false);
    expect(forum.comments({ includeDeleted: true })).toEqual([]);
    expect(forum.checkPostExists(postId)).toBe(true);
  });

  it('removeTag drops every post carrying the tag', () => {
    const userId = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const doomed = forum.addTag('Doomed', null, '#000000');
    const spared = forum.addTag('Spared', null, '#ffffff');
    const tagged = forum.addPost(userId, 'Tagged', 'C', null, [doomed, spared]);
    const untagged = forum.addPost(userId, 'Untagged', 'C', null, [spared]);
    const commentId = forum.addComment(tagged, userId, 'gone too');

    forum.removeTag(doomed);

    expect(forum.checkTagExists(doomed)).toBe(false);
    expect(forum.checkPostExists(tagged)).toBe(false);
    expect(forum.checkCommentExists(commentId)).toBe(false);
    expect(forum.postTags().some((link) => link.tagId === doomed)).toBe(false);
    expect(forum.checkPostExists(untagged)).toBe(true);
    expect(forum.postTags()).toEqual([{ postId: untagged, tagId: spared }]);
  });

  it('treats removal of missing ids as a no-op', () => {
    const userId = forum.addUser('A', 'B', 'a@x.com', 'pw');

    expect(() => forum.removeUser(99)).not.toThrow();
    expect(() => forum.removePost(99)).not.toThrow();
    expect(() => forum.removeTag(99)).not.toThrow();
    expect(() => forum.removeComment(99)).not.toThrow();
    expect(forum.checkUserExists(userId)).toBe(true);
  });

  it('is idempotent', () => {
    const userId = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const postId = forum.addPost(userId, 'T', 'C');

    forum.removePost(postId);
    forum.removePost(postId);

    expect(forum.checkPostExists(postId)).toBe(false);
  });
});

describe('failed cascades', () => {
  let db: Database.Database;
  let forum: ForumDatabase;

  beforeEach(() => {
    db = openConnection(':memory:');
    forum = new ForumDatabase(db, { bcryptRounds: TEST_BCRYPT_ROUNDS });
  });

  afterEach(() => {
    forum.close();
  });

  it('removeTag leaves every row in place when the tag delete fails', () => {
    const userId = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const tagId = forum.addTag('Pinned', null, '#000000');
    const first = forum.addPost(userId, 'First', 'C', null, [tagId]);
    const second = forum.addPost(userId, 'Second', 'C', null, [tagId]);
    const commentId = forum.addComment(first, userId, 'still here');
    db.exec("CREATE TRIGGER keep_tags BEFORE DELETE ON Tags BEGIN SELECT RAISE(ABORT, 'tags are locked'); END");

    expect(() => forum.removeTag(tagId)).toThrow(ValidationError);

    expect(forum.checkTagExists(tagId)).toBe(true);
    expect(forum.checkPostExists(first)).toBe(true);
    expect(forum.checkPostExists(second)).toBe(true);
    expect(forum.checkCommentExists(commentId)).toBe(true);
    expect(forum.postTags()).toEqual([
      { postId: first, tagId },
      { postId: second, tagId },
    ]);
  });

  it('removeUser leaves every row in place when the user delete fails', () => {
    const author = forum.addUser('A', 'B', 'a@x.com', 'pw');
    const reader = forum.addUser('C', 'D', 'c@x.com', 'pw');
    const tagId = forum.addTag('News', null, '#ff0000');
    const postId = forum.addPost(author, 'T', 'C', null, [tagId]);
    const byAuthor = forum.addComment(postId, author, 'mine');
    const byReader = forum.addComment(postId, reader, 'yours');
    db.exec("CREATE TRIGGER keep_users AFTER DELETE ON Users BEGIN SELECT RAISE(ABORT, 'users are locked'); END");

    expect(() => forum.removeUser(author)).toThrow(ValidationError);

    expect(forum.checkUserExists(author)).toBe(true);
    expect(forum.checkPostExists(postId)).toBe(true);
    expect(forum.checkCommentExists(byAuthor)).toBe(true);
    expect(forum.checkCommentExists(byReader)).toBe(true);
    expect(forum.postTags()).toEqual([{ postId, tagId }]);
  });
});
