/**
 * Tests for the evidence command group
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { createEvidenceCommand, pruneTarget } from '../evidence.js';
import { createStagesCommand } from '../stages.js';
import type { CommandContext } from '../../types.js';
import * as runtime from '../../runtime.js';
import { ValidationError } from '../../../errors/index.js';
import type { EvidenceChunk } from '../../../evidence/types.js';
import { STAGE_REGISTRY } from '../../../engine/stage-registry.js';
import { createFakeLLM } from '../../../test-utils/fakes.js';
import { createHarness, type Harness } from '../../../engine/__tests__/harness.js';

vi.mock('../../runtime.js', () => ({
  openEngine: vi.fn(),
  openSessionStore: vi.fn(),
  openIndex: vi.fn(),
}));

function chunk(overrides: Partial<EvidenceChunk>): EvidenceChunk {
  return {
    id: 'step-1:a',
    subgoalId: 'step-1',
    text: 'text',
    embedding: new Float32Array([1, 0]),
    score: 0.5,
    metadata: {},
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('evidence command', () => {
  let harness: Harness;
  let logOutput: string[];
  let mockContext: CommandContext;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    harness = createHarness({ llm: createFakeLLM([]), providers: [] });
    await harness.index.ingest('step-1', [
      { text: 'weak source', embedding: new Float32Array([1, 0]), sourceUrl: 'https://example.com/weak', score: 0.2 },
      { text: 'strong source', embedding: new Float32Array([0, 1]), sourceUrl: 'https://example.com/strong', score: 0.8 },
    ]);
    vi.mocked(runtime.openIndex).mockResolvedValue(harness.index);
  });

  afterEach(() => {
    harness.db.close();
    vi.restoreAllMocks();
  });

  async function run(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createEvidenceCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'evidence', ...args]);
  }

  it('shows counts per backend', async () => {
    await run(['stats']);
    expect(logOutput).toEqual([
      'Evidence index',
      '  memory: 2 live, 0 pruned',
      '  sqlite: 2 live, 0 pruned',
      '  reads from memory, dual write on, soft prune',
    ]);
  });

  it('prunes by score, then compacts', async () => {
    await run(['prune', '--below', '0.5']);
    expect(logOutput).toEqual(['✓ Pruned 1 chunk(s) (soft)']);
    expect(harness.index.liveChunks().map((c) => c.text)).toEqual(['strong source']);

    logOutput.length = 0;
    await run(['compact']);
    expect(logOutput).toEqual(['✓ Removed 1 pruned chunk(s)']);
    expect(harness.index.stats().sqlite).toEqual({ live: 1, pruned: 0 });
  });

  it('reports ids that were already pruned', async () => {
    const [weak] = harness.index.liveChunks();
    const id = weak?.id ?? '';
    await run(['prune', id]);
    logOutput.length = 0;

    await run(['prune', id, 'step-1:unknown']);
    expect(logOutput).toEqual(['✓ Pruned 0 chunk(s) (soft)', '  2 already pruned or unknown']);
  });

  it('requires ids or a filter, not both', async () => {
    await expect(run(['prune'])).rejects.toBeInstanceOf(ValidationError);
    await expect(run(['prune', 'step-1:a', '--subgoal', 'step-1'])).rejects.toBeInstanceOf(ValidationError);
    expect(runtime.openIndex).not.toHaveBeenCalled();
  });

  describe('pruneTarget', () => {
    it('combines --subgoal with --below', () => {
      const target = pruneTarget([], { subgoal: 'step-2', below: '0.4' });
      if (typeof target !== 'function') throw new Error('expected a predicate');

      expect(target(chunk({ subgoalId: 'step-2', score: 0.3 }))).toBe(true);
      expect(target(chunk({ subgoalId: 'step-1', score: 0.3 }))).toBe(false);
      expect(target(chunk({ subgoalId: 'step-2', score: 0.4 }))).toBe(false);
    });

    it('passes ids through', () => {
      expect(pruneTarget(['a', 'b'], {})).toEqual(['a', 'b']);
    });
  });
});

describe('stages command', () => {
  it('prints the registry as JSON', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const program = new Command();
    program.addCommand(
      createStagesCommand(() => ({
        options: { verbose: false, json: true },
        log: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      }))
    );
    await program.parseAsync(['node', 'test', 'stages']);

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual(JSON.parse(JSON.stringify(STAGE_REGISTRY)));
    consoleLogSpy.mockRestore();
  });
});
