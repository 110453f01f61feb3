/**
 * Configuration Schema
 *
 * Defines the shape of config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

/**
 * Storage settings
 */
export const DatabaseConfigSchema = z.object({
  path: z.string().min(1).describe('SQLite database file (":memory:" for a private in-memory store)'),
  journal_mode: z
    .enum(['wal', 'delete', 'truncate', 'memory'])
    .describe('SQLite journal mode for file databases'),
  busy_timeout_ms: z
    .number()
    .int()
    .min(0)
    .max(600000)
    .describe('How long a write waits on a locked database before failing'),
});

/**
 * Logging settings
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).describe('Lowest level that is printed'),
});

/**
 * Credential settings
 */
export const SecurityConfigSchema = z.object({
  bcrypt_rounds: z
    .number()
    .int()
    .min(4)
    .max(15)
    .describe('bcrypt cost factor used when hashing passwords'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  database: DatabaseConfigSchema,
  logging: LoggingConfigSchema,
  security: SecurityConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Every field optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
