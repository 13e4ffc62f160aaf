/**
 * Config Module Tests
 *
 * Loading, validation and merging, against a temporary DELVE_HOME.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import {
  loadConfig,
  resolveConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  deepMerge,
} from '../loader.js';
import { getConfigPath, getDbPath } from '../paths.js';
import { describeConfigKeys, findConfigKey } from '../keys.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('accepts the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown search provider', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      search: { ...DEFAULT_CONFIG.search, provider_priority: ['bing'] },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects a zero loop bound', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      research: { ...DEFAULT_CONFIG.research, max_research_loops: 0 },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects overlap that is not smaller than the chunk size', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      index: { ...DEFAULT_CONFIG.index, chunk_size: 100, chunk_overlap: 100 },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows deeply partial config', () => {
    const partial = { search: { circuit_breaker: { enabled: true } } };
    expect(PartialConfigSchema.safeParse(partial).success).toBe(true);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    const merged = deepMerge(
      { a: { b: 1, c: 2 }, list: [1, 2] },
      { a: { c: 3 }, list: [9] }
    );
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9] });
  });

  it('ignores undefined source values', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe('resolveConfig', () => {
  it('overrides only the given fields', () => {
    const config = resolveConfig({ research: { max_research_loops: 5 } });

    expect(config.research.max_research_loops).toBe(5);
    expect(config.research.initial_query_count).toBe(3);
    expect(config.search.timeout_ms).toBe(8000);
  });

  it('throws ConfigError with the failing path', () => {
    expect(() => resolveConfig({ search: { timeout_ms: 'fast' } })).toThrow(ConfigError);
    expect(() => resolveConfig({ search: { timeout_ms: 'fast' } })).toThrow(/search\.timeout_ms/);
  });
});

describe('config file lifecycle', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'delve-config-'));
    vi.stubEnv('DELVE_HOME', home);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('resolves paths under DELVE_HOME', () => {
    expect(getConfigPath()).toBe(path.join(home, 'config.toml'));
    expect(getDbPath()).toBe(path.join(home, 'delve.db'));
  });

  it('writes the template on first load and returns defaults', () => {
    const config = loadConfig();

    expect(fs.existsSync(getConfigPath())).toBe(true);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('parses the written template back to the defaults', () => {
    loadConfig();
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('does not create the file when asked not to', () => {
    loadConfig(false);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('merges a sparse user file', () => {
    fs.writeFileSync(getConfigPath(), '[research]\nrequire_planning_confirmation = false\n');

    const config = loadConfig();

    expect(config.research.require_planning_confirmation).toBe(false);
    expect(config.research.max_research_loops).toBe(2);
  });

  it('reports invalid TOML', () => {
    fs.writeFileSync(getConfigPath(), '[research\n');
    expect(() => loadConfig()).toThrow(/Invalid TOML/);
  });

  it('sets typed values', () => {
    setConfigValue('research.max_research_loops', '4');
    setConfigValue('search.circuit_breaker.enabled', 'true');
    setConfigValue('search.provider_priority', 'brave, duckduckgo');

    const config = loadConfig();
    expect(config.research.max_research_loops).toBe(4);
    expect(config.search.circuit_breaker.enabled).toBe(true);
    expect(config.search.provider_priority).toEqual(['brave', 'duckduckgo']);
    expect(getConfigValue('research.max_research_loops', config)).toBe(4);
  });

  it('rejects unknown keys and invalid values without writing', () => {
    expect(() => setConfigValue('research.nope', '1')).toThrow(/Unknown config key/);
    expect(() => setConfigValue('research', '1')).toThrow(/Unknown config key/);
    expect(() => setConfigValue('index.read_backend', 'redis')).toThrow(/Invalid value/);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('resets to the template', () => {
    setConfigValue('llm.model', 'local-model');
    resetConfig();
    expect(loadConfig().llm.model).toBe(DEFAULT_CONFIG.llm.model);
  });
});

describe('describeConfigKeys', () => {
  it('lists leaf keys with their schema description and default', () => {
    const keys = new Map(describeConfigKeys().map((info) => [info.key, info]));

    expect(keys.get('search.circuit_breaker.failure_threshold')).toEqual({
      key: 'search.circuit_breaker.failure_threshold',
      section: 'search',
      description: 'Consecutive failures that open the circuit',
      defaultValue: 3,
    });
    expect(keys.get('search.provider_priority')?.defaultValue).toEqual(['tavily', 'brave', 'duckduckgo']);
    expect(keys.has('search.circuit_breaker')).toBe(false);
  });

  it('looks through the refined index section', () => {
    expect(findConfigKey('index.audit_threshold')?.description).toBe(
      'Chunks scored below this are pruned (0 disables)'
    );
    expect(findConfigKey('index')).toBeUndefined();
  });
});
