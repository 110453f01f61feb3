/**
 * Environment Variable Handler
 *
 * Environment overrides for config.toml. Supports .env files for local
 * development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';
import { ConfigError } from '../errors/index.js';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * All overrides are optional; absent ones leave the file's value in place.
 */
export const EnvSchema = z.object({
  FORUMDB_CONFIG_PATH: z.string().min(1).optional(),
  FORUMDB_DB_PATH: z.string().min(1).optional(),
  FORUMDB_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Cached environment (loaded once at first access) */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment overrides (called once, then cached).
 *
 * @throws ConfigError if a variable is set to an invalid value
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    FORUMDB_CONFIG_PATH: emptyToUndefined(process.env.FORUMDB_CONFIG_PATH),
    FORUMDB_DB_PATH: emptyToUndefined(process.env.FORUMDB_DB_PATH),
    FORUMDB_LOG_LEVEL: emptyToUndefined(process.env.FORUMDB_LOG_LEVEL),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment configuration:\n${issues}`,
      `FORUMDB_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment override by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
