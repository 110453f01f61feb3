/**
 * Row Validation Tests
 */

import { describe, it, expect } from 'vitest';

import {
  CommentRowSchema,
  ModifyPostOptionsSchema,
  PostTagRowSchema,
  SchemaValidationError,
  UserRowSchema,
  validateOptions,
  validateRow,
  validateRows,
} from '../validation.js';
import { ValidationError } from '../../errors/index.js';

const userRow = {
  Id: 1,
  FirstName: 'Ada',
  LastName: 'Lovelace',
  Email: 'ada@example.com',
  Password: '$2a$04$placeholderplaceholderplaceholderplaceholderplacehol',
  Admin: 1,
  Bio: null,
  AddedOn: '2025-01-01T00:00:00.000Z',
};

describe('row schemas', () => {
  it('maps a Users row to a frozen User', () => {
    const user = validateRow(UserRowSchema, userRow, 'Users.Id=1');

    expect(user).toEqual({
      id: 1,
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      password: userRow.Password,
      admin: true,
      bio: null,
      addedOn: new Date('2025-01-01T00:00:00.000Z'),
    });
    expect(Object.isFrozen(user)).toBe(true);
  });

  it('reads a NULL Admin as false', () => {
    expect(validateRow(UserRowSchema, { ...userRow, Admin: null }, 'Users').admin).toBe(false);
  });

  it('maps comment timestamps to Dates', () => {
    const comment = validateRow(
      CommentRowSchema,
      {
        Id: 3,
        PostId: 1,
        UserId: 2,
        Content: 'hi',
        AddedOn: '2025-01-01T00:00:00.000Z',
        EditedOn: '2025-01-02T00:00:00.000Z',
        DeletedOn: null,
      },
      'Comments.Id=3'
    );

    expect(comment.editedOn).toEqual(new Date('2025-01-02T00:00:00.000Z'));
    expect(comment.deletedOn).toBeNull();
  });

  it('throws SchemaValidationError for an unreadable timestamp', () => {
    expect(() => validateRow(UserRowSchema, { ...userRow, AddedOn: 'yesterday' }, 'Users.Id=1')).toThrow(
      SchemaValidationError
    );
  });

  it('names the row and the failing column', () => {
    try {
      validateRow(UserRowSchema, { ...userRow, Email: 42 }, 'Users.Id=1');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.message).toBe('Database schema mismatch in Users.Id=1');
        expect(error.issues.map((issue) => issue.path)).toEqual(['Email']);
        expect(error.code).toBe(5);
      }
    }
  });

  it('indexes the failing row of a batch', () => {
    const rows = [
      { PostId: 1, TagId: 2 },
      { PostId: 1, TagId: 'two' },
    ];

    expect(() => validateRows(PostTagRowSchema, rows, 'PostTags')).toThrow(
      'Database schema mismatch in PostTags[1]'
    );
  });
});

describe('validateOptions', () => {
  it('returns the parsed options', () => {
    const options = validateOptions(ModifyPostOptionsSchema, { title: 'New', tags: [1, { id: 2 }] }, 'modifyPost');

    expect(options.title).toBe('New');
    expect(options.tags).toEqual([1, { id: 2 }]);
  });

  it('lists every issue with its path', () => {
    try {
      validateOptions(ModifyPostOptionsSchema, { title: 5, tags: [0] }, 'modifyPost');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid options for modifyPost');
        expect(error.issues.some((issue) => issue.startsWith('title: '))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('tags.0: '))).toBe(true);
      }
    }
  });

  it('reports unknown keys against the options object', () => {
    try {
      validateOptions(ModifyPostOptionsSchema, { colour: 'red' }, 'modifyPost');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^\(options\): .*colour/);
      }
    }
  });
});
