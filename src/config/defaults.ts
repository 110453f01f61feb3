/**
 * Default Configuration Values
 *
 * Used when no config.toml exists or when it omits fields.
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';
import { DB_PATH } from './paths.js';

export const DEFAULT_CONFIG: Config = {
  database: {
    path: DB_PATH,
    journal_mode: 'wal',
    busy_timeout_ms: 5000,
  },

  logging: {
    level: 'info',
  },

  security: {
    bcrypt_rounds: 10,
  },
};

/**
 * Config file template (TOML format)
 * Written on first run when createIfMissing is set
 */
export const CONFIG_TEMPLATE = `# forumdb configuration

[database]
path = ${JSON.stringify(DEFAULT_CONFIG.database.path)}
journal_mode = "${DEFAULT_CONFIG.database.journal_mode}"   # wal | delete | truncate | memory
busy_timeout_ms = ${DEFAULT_CONFIG.database.busy_timeout_ms}

[logging]
level = "${DEFAULT_CONFIG.logging.level}"   # debug | info | warn | error | silent

[security]
bcrypt_rounds = ${DEFAULT_CONFIG.security.bcrypt_rounds}   # 4-15
`;
