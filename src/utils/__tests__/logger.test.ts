/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import { createLogger, silentLogger } from '../logger.js';

describe('createLogger', () => {
  const log = vi.spyOn(console, 'log');
  const warn = vi.spyOn(console, 'warn');
  const error = vi.spyOn(console, 'error');

  beforeEach(() => {
    log.mockImplementation(() => {});
    warn.mockImplementation(() => {});
    error.mockImplementation(() => {});
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  afterAll(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope', () => {
    const logger = createLogger('Database', 'debug');

    logger.info?.('Added user 1');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toContain('[Database]');
    expect(String(log.mock.calls[0]?.[0])).toContain('Added user 1');
  });

  it('labels warnings and errors', () => {
    const logger = createLogger('Database');

    logger.warn('Users table does not exist');
    logger.error?.('disk full');

    expect(String(warn.mock.calls[0]?.[0])).toContain('[Database] Warning: Users table does not exist');
    expect(String(error.mock.calls[0]?.[0])).toContain('[Database] Error: disk full');
  });

  it('drops messages below the level', () => {
    const logger = createLogger('Database', 'warn');

    logger.debug?.('noise');
    logger.info?.('noise');
    logger.warn('kept');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('prints nothing when silent', () => {
    const logger = createLogger('Database', 'silent');

    logger.error?.('ignored');
    logger.warn('ignored');

    expect(error).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('hides debug output at the default level', () => {
    createLogger('Database').debug?.('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('silentLogger accepts every level without output', () => {
    silentLogger.debug?.('x');
    silentLogger.info?.('x');
    silentLogger.warn('x');
    silentLogger.error?.('x');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
