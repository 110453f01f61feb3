/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  DatabaseConfigSchema,
  LoggingConfigSchema,
  SecurityConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
  type ConfigPathOptions,
  type LoadConfigOptions,
} from './loader.js';

// Path constants
export { FORUMDB_DIR, DB_PATH, CONFIG_PATH, IN_MEMORY, resolveDataPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
