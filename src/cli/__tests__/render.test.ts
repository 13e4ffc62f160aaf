import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import type { ResearchEvent, SessionStatus } from '../../engine/types.js';
import { EventRenderer, describeEvent, formatPlan, formatStatus } from '../render.js';
import type { CommandContext } from '../types.js';

const SESSION = 'session-1';

function context(json = false): CommandContext & { lines: string[] } {
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

describe('research rendering', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('describeEvent', () => {
    it('summarizes a search batch', () => {
      const event: ResearchEvent = {
        type: 'SearchBatchCompleted',
        sessionId: SESSION,
        round: 2,
        queries: [
          { query: 'a', status: 'ok', provider: 'tavily', resultCount: 3, attempts: [] },
          { query: 'b', status: 'failed', resultCount: 0, attempts: [] },
        ],
        newSources: [{ id: 4, url: 'https://example.com/a', title: 'A' }],
      };
      expect(describeEvent(event)).toBe('Round 2: 1/2 queries answered, 1 new source');
    });

    it('prefers router feedback for planning updates', () => {
      expect(
        describeEvent({
          type: 'PlanningUpdated',
          sessionId: SESSION,
          planningStatus: 'confirmed',
          plan: [],
          feedback: 'Plan confirmed. Proceeding to research.',
        })
      ).toBe('Plan confirmed. Proceeding to research.');
      expect(
        describeEvent({ type: 'PlanningUpdated', sessionId: SESSION, planningStatus: 'auto_approved', plan: [] })
      ).toBe('Plan has 0 steps');
    });

    it('lists only non-zero compression and indexing details', () => {
      expect(
        describeEvent({
          type: 'CompressionCompleted',
          sessionId: SESSION,
          units: 1,
          tokens: 42,
          duplicatesRemoved: 2,
          droppedForBudget: 0,
          summarized: false,
        })
      ).toBe('Compressed to 1 unit (~42 tokens), 2 duplicates removed');
      expect(
        describeEvent({ type: 'EvidenceIndexed', sessionId: SESSION, written: 3, failures: ['x'], pruned: 0 })
      ).toBe('Indexed 3 chunks, 1 write failure');
    });

    it('describes reflection gaps', () => {
      expect(
        describeEvent({
          type: 'ReflectionCompleted',
          sessionId: SESSION,
          round: 1,
          isSufficient: false,
          knowledgeGap: 'error rates',
          followUpQueries: ['qubit error rates'],
        })
      ).toBe('Round 1: 1 follow-up query for "error rates"');
    });
  });

  it('formats plan steps with status markers', () => {
    expect(
      formatPlan([
        { id: 'step-1', title: 'Research: a', query: 'a', tool: 'web_search', status: 'done' },
        { id: 'step-2', title: 'Research: b', query: 'b', tool: 'web_search', status: 'blocked' },
        { id: 'step-3', title: 'Research: c', query: 'c', tool: 'web_search', status: 'pending' },
      ])
    ).toEqual(['  ● step-1 a', '  ✗ step-2 b', '  ○ step-3 c']);
  });

  it('formats a session status', () => {
    const status: SessionStatus = {
      sessionId: SESSION,
      question: 'What is quantum computing?',
      state: 'failed',
      planningStatus: 'auto_approved',
      plan: [],
      evidenceCount: 1,
      researchLoopCount: 2,
      outcome: { kind: 'failed', reason: 'No search providers configured' },
    };
    expect(formatStatus(status)).toEqual([
      'Session:  session-1',
      'Question: What is quantum computing?',
      'State:    failed (auto_approved)',
      'Rounds:   2',
      'Evidence: 1 unit',
      'Outcome:  failed: No search providers configured',
    ]);
  });

  describe('EventRenderer', () => {
    it('prints one line per event without a terminal', () => {
      const ctx = context();
      const renderer = new EventRenderer(ctx, false);
      renderer.start('Planning search queries...');
      renderer.listener({ type: 'ValidationCompleted', sessionId: SESSION, kept: 2, rejected: 1, notes: [] });
      renderer.listener({ type: 'Failed', sessionId: SESSION, reason: 'boom' });

      expect(ctx.lines).toEqual([
        'Planning search queries...',
        '✓ Validation kept 2, rejected 1',
        '✗ Research failed: boom',
      ]);
    });

    it('streams events as JSON lines with --json', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const ctx = context(true);
      const renderer = new EventRenderer(ctx, false);
      const event: ResearchEvent = { type: 'Cancelled', sessionId: SESSION };
      renderer.start('ignored');
      renderer.listener(event);

      expect(spy).toHaveBeenCalledWith('{"type":"Cancelled","sessionId":"session-1"}');
      expect(ctx.lines).toEqual([]);
    });
  });
});
