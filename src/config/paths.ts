/**
 * Centralized Path Definitions
 *
 * Single source of truth for the Delve data directory. Resolved on every
 * call so DELVE_HOME can be changed by tests.
 *
 * Directory structure:
 * ~/.delve/
 * ├── delve.db        (SQLite: evidence chunks, research sessions)
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the data directory (~/.delve, or $DELVE_HOME when set)
 */
export function getDelveDir(): string {
  const override = process.env.DELVE_HOME?.trim();
  return override ? override : join(homedir(), '.delve');
}

/**
 * Get the database file path (~/.delve/delve.db)
 */
export function getDbPath(): string {
  return join(getDelveDir(), 'delve.db');
}

/**
 * Get the config file path (~/.delve/config.toml)
 */
export function getConfigPath(): string {
  return join(getDelveDir(), 'config.toml');
}
