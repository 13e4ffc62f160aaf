import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors/index.js';
import {
  EvidencePruneOptionsSchema,
  EvidenceQueryOptionsSchema,
  ResearchArgsSchema,
  ResearchOptionsSchema,
  SessionsOptionsSchema,
  parseInput,
} from '../validation.js';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('CLI input validation', () => {
  describe('research', () => {
    it('coerces numeric flags', () => {
      expect(parseInput(ResearchOptionsSchema, { loops: '3', queries: '2' })).toEqual({ loops: 3, queries: 2 });
    });

    it('rejects counts out of range', () => {
      expect(issuesOf(() => parseInput(ResearchOptionsSchema, { loops: '0' }))).toEqual([
        'loops: --loops must be between 1 and 10',
      ]);
    });

    it('reports non-numeric counts first', () => {
      const issues = issuesOf(() => parseInput(ResearchOptionsSchema, { queries: 'many' }));
      expect(issues[0]).toBe('queries: --queries must be a whole number');
    });

    it('rejects --confirm with --auto', () => {
      expect(issuesOf(() => parseInput(ResearchOptionsSchema, { confirm: true, auto: true }))).toEqual([
        '--confirm and --auto cannot be used together',
      ]);
    });

    it('trims the question and requires three characters', () => {
      expect(parseInput(ResearchArgsSchema, { question: '  What is AI?  ' })).toEqual({ question: 'What is AI?' });
      expect(issuesOf(() => parseInput(ResearchArgsSchema, { question: ' ok ' }))).toEqual([
        'question: Question must be at least 3 characters',
      ]);
    });

    it('wraps issues in a ValidationError with exit code 1', () => {
      try {
        parseInput(ResearchOptionsSchema, { loops: '11' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.message).toBe('Invalid command input');
          expect(error.code).toBe(1);
        }
      }
    });
  });

  describe('sessions and evidence', () => {
    it('applies defaults', () => {
      expect(parseInput(SessionsOptionsSchema, {})).toEqual({ limit: 20 });
      expect(parseInput(EvidenceQueryOptionsSchema, {})).toEqual({ topK: 5, minScore: 0 });
    });

    it('parses scores between 0 and 1', () => {
      expect(parseInput(EvidencePruneOptionsSchema, { ids: [], below: '0.3' })).toEqual({ ids: [], below: 0.3 });
      expect(parseInput(EvidenceQueryOptionsSchema, { minScore: '1' })).toEqual({ topK: 5, minScore: 1 });
    });

    it('rejects scores outside 0-1', () => {
      expect(issuesOf(() => parseInput(EvidencePruneOptionsSchema, { ids: [], below: '1.5' }))).toEqual([
        'below: --below must be between 0 and 1',
      ]);
    });
  });
});
