/**
 * Tests for the config command, against a temporary DELVE_HOME.
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext } from '../../types.js';
import { ConfigError } from '../../../errors/index.js';

describe('createConfigCommand', () => {
  let home: string;
  let logOutput: string[];
  let mockContext: CommandContext;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'delve-config-'));
    vi.stubEnv('DELVE_HOME', home);
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(home, { recursive: true, force: true });
  });

  async function run(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'config', ...args]);
  }

  describe('list', () => {
    it('shows the keys of a section with their descriptions', async () => {
      await run(['list', 'compression']);

      expect(logOutput[0]?.split('\n')).toEqual([
        '┌──────────────────┬────────┬────────────────────────────┐',
        '│ Key              │ Value  │ Description                │',
        '├──────────────────┼────────┼────────────────────────────┤',
        '│ compression.mode │ tiered │ tiered adds an LLM summary │',
        '└──────────────────┴────────┴────────────────────────────┘',
      ]);
      expect(logOutput[1]).toBe(`Config file: ${path.join(home, 'config.toml')}`);
    });

    it('marks values changed from the default', async () => {
      await run(['set', 'compression.mode', 'extractive']);
      logOutput = [];

      await run(['list', 'compression']);

      expect(logOutput[0]?.split('\n')[3]).toBe('│ compression.mode │ extractive * │ tiered adds an LLM summary │');
      expect(logOutput[1]).toBe('* changed from the default');
    });

    it('rejects an unknown section', async () => {
      await expect(run(['list', 'nope'])).rejects.toThrow(ConfigError);
    });
  });

  describe('get and set', () => {
    it('reports the previous and the new value', async () => {
      await run(['set', 'research.max_research_loops', '3']);

      expect(logOutput).toEqual(['✓ research.max_research_loops: 2 → 3']);
    });

    it('prints value and default as JSON', async () => {
      await run(['set', 'research.max_research_loops', '3']);
      mockContext.options.json = true;
      const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

      await run(['get', 'research.max_research_loops']);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        key: 'research.max_research_loops',
        value: 3,
        default: 2,
      });
    });

    it('takes lists as comma-separated items', async () => {
      await run(['set', 'search.provider_priority', 'duckduckgo,brave']);
      logOutput = [];

      await run(['get', 'search.provider_priority']);

      expect(logOutput).toEqual(['duckduckgo,brave']);
    });

    it('rejects an unknown key', async () => {
      await expect(run(['get', 'llm.nope'])).rejects.toThrow("Unknown config key: 'llm.nope'");
      await expect(run(['set', 'llm', 'x'])).rejects.toThrow("Unknown config key: 'llm'");
    });
  });

  describe('reset', () => {
    it('asks for --force first', async () => {
      await run(['reset']);

      expect(logOutput).toEqual([
        `This replaces ${path.join(home, 'config.toml')} with the defaults.`,
        'Run with --force to confirm.',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('restores the defaults', async () => {
      await run(['set', 'research.max_research_loops', '3']);
      logOutput = [];

      await run(['reset', '--force']);
      await run(['get', 'research.max_research_loops']);

      expect(logOutput).toEqual(['✓ Restored the default configuration', '2']);
    });
  });

  it('formats values the way set accepts them', () => {
    expect(formatValue(['tavily', 'brave'])).toBe('tavily,brave');
    expect(formatValue(false)).toBe('false');
    expect(formatValue(0.9)).toBe('0.9');
  });
});
