/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Locate config.toml (option, FORUMDB_CONFIG_PATH, or ~/.forumdb)
 * 2. Load it if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { CONFIG_PATH, resolveDataPath } from './paths.js';
import { loadEnv } from './env.js';
import { ConfigError } from '../errors/index.js';

/**
 * Where to read the config file from
 */
export interface ConfigPathOptions {
  /** Explicit config file; overrides FORUMDB_CONFIG_PATH */
  configPath?: string;
}

export interface LoadConfigOptions extends ConfigPathOptions {
  /** Write the default template when the file is missing (default false) */
  createIfMissing?: boolean;
}

/**
 * Resolve the config file path
 */
export function getConfigPath(options: ConfigPathOptions = {}): string {
  return resolveDataPath(options.configPath ?? loadEnv().FORUMDB_CONFIG_PATH ?? CONFIG_PATH);
}

/**
 * Deep merge two objects, with source values overriding target
 */
function deepMerge<T extends Record<string, unknown>>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key of Object.keys(source) as Array<keyof T>) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === 'object' &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(
        targetValue as Record<string, unknown>,
        sourceValue as Record<string, unknown>
      ) as T[keyof T];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

/**
 * Read and parse the TOML file at configPath
 */
function readToml(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');

  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(`Invalid TOML in config file: ${message}`, `Fix the syntax in ${configPath}`);
  }
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Load the merged config (defaults + file + environment)
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = getConfigPath(options);
  let config: Config = DEFAULT_CONFIG;

  if (fs.existsSync(configPath)) {
    const validationResult = PartialConfigSchema.safeParse(readToml(configPath));

    if (!validationResult.success) {
      throw new ConfigError(
        `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
        `Fix the values in ${configPath} or delete it to restore defaults`
      );
    }

    const userConfig: PartialConfig = validationResult.data;
    config = deepMerge(DEFAULT_CONFIG, userConfig as Partial<Config>);
  } else if (options.createIfMissing) {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  }

  const env = loadEnv();
  return {
    database: {
      ...config.database,
      path: resolveDataPath(env.FORUMDB_DB_PATH ?? config.database.path),
    },
    logging: {
      level: env.FORUMDB_LOG_LEVEL ?? config.logging.level,
    },
    security: { ...config.security },
  };
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('logging.level') => 'info'
 */
export function getConfigValue(key: string, options: ConfigPathOptions = {}): unknown {
  const parts = key.split('.');

  let current: unknown = loadConfig(options);
  for (const part of parts) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = (current as Record<string, unknown>)[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string, options: ConfigPathOptions = {}): void {
  const configPath = getConfigPath(options);
  const parts = key.split('.').filter((part) => part !== '');
  const lastPart = parts.pop();

  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key', 'Use a dotted key such as logging.level');
  }
  if (!isKnownKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}`, 'Run listConfig() to see available keys');
  }

  let config: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    config = readToml(configPath);
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (typeof next !== 'object' || next === null || Array.isArray(next)) {
      current[part] = {};
    }
    current = current[part] as Record<string, unknown>;
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const validationResult = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config as Partial<Config>));

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run listConfig() to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * True when key names a leaf of the default config
 */
function isKnownKey(key: string): boolean {
  let current: unknown = DEFAULT_CONFIG;
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || !(part in current)) {
      return false;
    }
    current = (current as Record<string, unknown>)[part];
  }
  return typeof current !== 'object' || current === null;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['logging.level', 'info']
 */
export function listConfig(options: ConfigPathOptions = {}): Array<[string, unknown]> {
  const config = loadConfig(options);
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value as Record<string, unknown>, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
