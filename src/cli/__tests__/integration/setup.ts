/**
 * Integration Test Setup
 *
 * Shared utilities for CLI integration tests that use real SQLite databases.
 *
 * Key concepts:
 * 1. DELVE_HOME - Points the data directory at a temp directory, so tests
 *    never touch ~/.delve
 * 2. Offline config - Hashing embedder and heuristic stages, so only the
 *    LLM and the search providers need replacing
 * 3. Singleton Reset - resetAll() between commands makes the next command
 *    behave like a fresh process
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { Command } from 'commander';
import type { CommandContext } from '../../types.js';
import { resetAll } from '../../../test-utils/index.js';

/**
 * config.toml that needs no embedding or validation calls.
 */
export const OFFLINE_CONFIG = `
[llm]
embedding_provider = "hashing"
embedding_dimensions = 256

[research]
max_research_loops = 1
initial_query_count = 1
require_planning_confirmation = true

[search]
provider_priority = ["duckduckgo"]

[validation]
mode = "heuristic"

[compression]
mode = "extractive"
`;

export interface TestHome {
  root: string;
  /** Restore DELVE_HOME and delete the directory */
  cleanup: () => void;
}

export function createTestHome(config: string = OFFLINE_CONFIG): TestHome {
  const previous = process.env.DELVE_HOME;
  const root = mkdtempSync(join(tmpdir(), 'delve-test-'));
  writeFileSync(join(root, 'config.toml'), config, 'utf-8');
  process.env.DELVE_HOME = root;

  return {
    root,
    cleanup: () => {
      resetAll();
      if (previous === undefined) {
        delete process.env.DELVE_HOME;
      } else {
        process.env.DELVE_HOME = previous;
      }
      rmSync(root, { recursive: true, force: true });
    },
  };
}

export function createTestContext(json = false): CommandContext & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    options: { verbose: false, json },
    log: (message: string) => lines.push(message),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export async function runCommand(command: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.addCommand(command);
  await program.parseAsync(['node', 'delve', command.name(), ...args]);
}
