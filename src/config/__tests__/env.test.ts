/**
 * Environment Override Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { _clearEnvCache, getEnv, loadEnv } from '../env.js';
import { ConfigError } from '../../errors/index.js';

describe('loadEnv', () => {
  beforeEach(() => {
    vi.stubEnv('FORUMDB_CONFIG_PATH', '');
    vi.stubEnv('FORUMDB_DB_PATH', '');
    vi.stubEnv('FORUMDB_LOG_LEVEL', '');
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('treats empty variables as unset', () => {
    expect(loadEnv()).toEqual({
      FORUMDB_CONFIG_PATH: undefined,
      FORUMDB_DB_PATH: undefined,
      FORUMDB_LOG_LEVEL: undefined,
    });
  });

  it('reads the overrides', () => {
    vi.stubEnv('FORUMDB_DB_PATH', '/tmp/forum.db');
    vi.stubEnv('FORUMDB_LOG_LEVEL', 'debug');

    expect(getEnv('FORUMDB_DB_PATH')).toBe('/tmp/forum.db');
    expect(getEnv('FORUMDB_LOG_LEVEL')).toBe('debug');
  });

  it('caches until cleared', () => {
    vi.stubEnv('FORUMDB_DB_PATH', '/tmp/first.db');
    expect(getEnv('FORUMDB_DB_PATH')).toBe('/tmp/first.db');

    vi.stubEnv('FORUMDB_DB_PATH', '/tmp/second.db');
    expect(getEnv('FORUMDB_DB_PATH')).toBe('/tmp/first.db');

    _clearEnvCache();
    expect(getEnv('FORUMDB_DB_PATH')).toBe('/tmp/second.db');
  });

  it('rejects an unknown log level', () => {
    vi.stubEnv('FORUMDB_LOG_LEVEL', 'verbose');

    expect(() => loadEnv()).toThrow(ConfigError);
  });
});
