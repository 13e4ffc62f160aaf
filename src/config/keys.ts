/**
 * Config key catalogue
 *
 * Every settable key in config.toml with the description from its schema
 * and its default. `delve config list` renders this next to the current
 * values.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import { getConfigValue } from './loader.js';
import { ConfigSchema } from './schema.js';

export interface ConfigKeyInfo {
  /** Dot-notation key, e.g. "search.circuit_breaker.enabled" */
  key: string;
  section: string;
  description: string;
  defaultValue: unknown;
}

/** Object schema behind a section, looking through refinements */
function sectionShape(schema: z.ZodTypeAny): z.ZodRawShape | null {
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    return shape;
  }
  if (schema instanceof z.ZodEffects) {
    return sectionShape(schema.innerType());
  }
  return null;
}

export function describeConfigKeys(): ConfigKeyInfo[] {
  const keys: ConfigKeyInfo[] = [];

  const walk = (schema: z.ZodTypeAny, prefix: string): void => {
    const shape = sectionShape(schema);
    if (!shape) {
      keys.push({
        key: prefix,
        section: prefix.split('.')[0] ?? prefix,
        description: schema.description ?? '',
        defaultValue: getConfigValue(prefix, DEFAULT_CONFIG),
      });
      return;
    }
    for (const [name, child] of Object.entries(shape)) {
      walk(child, prefix ? `${prefix}.${name}` : name);
    }
  };

  walk(ConfigSchema, '');
  return keys;
}

/**
 * Catalogue entry for a key.
 */
export function findConfigKey(key: string): ConfigKeyInfo | undefined {
  return describeConfigKeys().find((info) => info.key === key);
}
