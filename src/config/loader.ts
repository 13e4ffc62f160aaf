/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the data directory (~/.delve)
 * 2. Load config.toml if it exists
 * 3. Validate with the partial Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Validate the merged result and provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getDelveDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonMap(value: unknown): value is TOML.JsonMap {
  return isPlainObject(value);
}

/**
 * Deep merge, with source values overriding target. Arrays are replaced,
 * not concatenated.
 */
export function deepMerge(target: unknown, source: unknown): unknown {
  if (isPlainObject(target) && isPlainObject(source)) {
    const result: Record<string, unknown> = { ...target };
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        result[key] = deepMerge(target[key], value);
      }
    }
    return result;
  }
  return source === undefined ? target : source;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function ensureDelveDir(): void {
  const dir = getDelveDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: delve config reset --force`
    );
  }
}

/**
 * Resolve a complete config from a sparse user object.
 *
 * @throws ConfigError when a field has the wrong type or range
 */
export function resolveConfig(userConfig: unknown): Config {
  const partial = PartialConfigSchema.safeParse(userConfig);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      'Run: delve config reset --force  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureDelveDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return resolveConfig({});
  }

  return resolveConfig(readConfigFile(configPath));
}

/**
 * Walk a dot-notation path ("search.circuit_breaker.enabled").
 */
function lookup(root: unknown, key: string): unknown {
  let current: unknown = root;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('search.timeout_ms') => 8000
 */
export function getConfigValue(key: string, config: Config = loadConfig()): unknown {
  return lookup(config, key);
}

/**
 * Parse a CLI string into the type of the value it replaces.
 * Arrays take comma-separated items.
 */
function parseValue(value: string, current: unknown): unknown {
  if (Array.isArray(current)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 *
 * @throws ConfigError for unknown keys or values the schema rejects
 */
export function setConfigValue(key: string, value: string): void {
  const current = lookup(DEFAULT_CONFIG, key);
  if (current === undefined || isPlainObject(current)) {
    throw new ConfigError(
      `Unknown config key: '${key}'`,
      'Run: delve config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureDelveDir();

  const config: Record<string, unknown> = fs.existsSync(configPath)
    ? readConfigFile(configPath)
    : {};

  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let section = config;
  for (const part of parts) {
    const next = section[part];
    if (isPlainObject(next)) {
      section = next;
    } else {
      const created: Record<string, unknown> = {};
      section[part] = created;
      section = created;
    }
  }
  section[lastPart] = parseValue(value, current);

  // Validate the complete config before saving
  try {
    resolveConfig(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(
        `Invalid value for '${key}': ${error.message}`,
        'Run: delve config list  to see current values and types'
      );
    }
    throw error;
  }

  if (!isJsonMap(config)) {
    throw new ConfigError(`Cannot serialise config for '${key}'`);
  }
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Overwrite config.toml with the default template.
 */
export function resetConfig(): void {
  ensureDelveDir();
  fs.writeFileSync(getConfigPath(), CONFIG_TEMPLATE, 'utf-8');
}
