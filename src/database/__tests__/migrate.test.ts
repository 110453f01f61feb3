/**
 * Schema Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';

import { ensureSchema, getMissingTables, getRequiredTables } from '../migrate.js';
import { ForumDatabase } from '../operations.js';
import { SchemaError } from '../../errors/index.js';
import { createRecordingLogger } from '../../test-utils/index.js';

describe('ensureSchema', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('lists the tables parents first', () => {
    expect(getRequiredTables()).toEqual(['Users', 'Posts', 'Tags', 'Comments', 'PostTags']);
  });

  it('creates every table in an empty database', () => {
    const result = ensureSchema(db);

    expect(result.existing).toEqual([]);
    expect(result.created).toEqual(['Users', 'Posts', 'Tags', 'Comments', 'PostTags']);
    expect(getMissingTables(db)).toEqual([]);
  });

  it('does nothing on a second run', () => {
    ensureSchema(db);

    const result = ensureSchema(db);

    expect(result.created).toEqual([]);
    expect(result.existing).toEqual(['Users', 'Posts', 'Tags', 'Comments', 'PostTags']);
  });

  it('does not warn when creating a fresh database', () => {
    const logger = createRecordingLogger();

    ensureSchema(db, logger);

    expect(logger.messages.warn).toEqual([]);
  });

  it('recreates a dropped table and warns about it', () => {
    ensureSchema(db);
    db.exec('DROP TABLE Comments');
    const logger = createRecordingLogger();

    const result = ensureSchema(db, logger);

    expect(result.created).toEqual(['Comments']);
    expect(logger.messages.warn).toEqual(['Comments table does not exist in the database. Recreating it.']);
  });

  it('keeps rows in tables that already exist', () => {
    ensureSchema(db);
    db.prepare("INSERT INTO Tags (Name, Colour, AddedOn) VALUES ('News', '#ff0000', '2025-01-01T00:00:00.000Z')").run();
    db.exec('DROP TABLE PostTags');

    ensureSchema(db);

    expect(db.prepare('SELECT COUNT(*) AS count FROM Tags').get()).toEqual({ count: 1 });
  });

  it('defaults Admin to false', () => {
    ensureSchema(db);
    db.prepare(
      "INSERT INTO Users (FirstName, LastName, Email, Password, AddedOn) VALUES ('A', 'B', 'a@x.com', 'h', '2025-01-01T00:00:00.000Z')"
    ).run();

    expect(db.prepare('SELECT Admin FROM Users').get()).toEqual({ Admin: 0 });
  });

  it('enforces one row per post-tag pair', () => {
    ensureSchema(db);

    const columns = db.prepare("SELECT name, pk FROM pragma_table_info('PostTags') ORDER BY pk").all();

    expect(columns).toEqual([
      { name: 'PostId', pk: 1 },
      { name: 'TagId', pk: 2 },
    ]);
  });

  it('throws SchemaError when the database cannot be used', () => {
    db.close();

    expect(() => ensureSchema(db)).toThrow(SchemaError);
  });

  it('runs when the accessor is constructed', () => {
    const forum = new ForumDatabase(db, { bcryptRounds: 4, logger: { warn: vi.fn() } });

    expect(getMissingTables(db)).toEqual([]);
    forum.close();
  });
});
