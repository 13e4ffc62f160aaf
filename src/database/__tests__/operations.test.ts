/**
 * Database Operations Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { DatabaseOperations } from '../operations.js';
import { runMigrations } from '../migrate.js';
import { blobToEmbedding, type EvidenceChunkInsert } from '../schema.js';

function chunk(id: string, subgoalId = 'step-1', overrides: Partial<EvidenceChunkInsert> = {}): EvidenceChunkInsert {
  return {
    id,
    subgoalId,
    content: `content of ${id}`,
    embedding: new Float32Array([1, 0, 0]),
    sourceUrl: `https://example.com/${id}`,
    title: `Title ${id}`,
    score: 0.5,
    ...overrides,
  };
}

describe('DatabaseOperations', () => {
  let db: Database.Database;
  let ops: DatabaseOperations;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    ops = new DatabaseOperations(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('evidence chunks', () => {
    it('inserts and reads back a chunk', () => {
      ops.insertEvidenceChunk(
        chunk('step-1:a', 'step-1', { metadata: { query: 'q' }, createdAt: '2026-01-01T00:00:00.000Z' })
      );

      const row = ops.getEvidenceChunk('step-1:a');
      expect(row).toBeDefined();
      expect(row?.subgoal_id).toBe('step-1');
      expect(row?.source_url).toBe('https://example.com/step-1:a');
      expect(row?.metadata).toBe('{"query":"q"}');
      expect(row?.created_at).toBe('2026-01-01T00:00:00.000Z');
      expect(row?.pruned_at).toBeNull();
      expect(Array.from(blobToEmbedding(row?.embedding ?? Buffer.alloc(0)))).toEqual([1, 0, 0]);
    });

    it('stores missing optional fields as NULL', () => {
      ops.insertEvidenceChunk(chunk('x', 'step-1', { sourceUrl: undefined, title: undefined }));

      const row = ops.getEvidenceChunk('x');
      expect(row?.source_url).toBeNull();
      expect(row?.title).toBeNull();
      expect(row?.metadata).toBeNull();
    });

    it('rolls back a batch when one insert fails', () => {
      ops.insertEvidenceChunk(chunk('dup'));

      expect(() => ops.insertEvidenceChunks([chunk('fresh'), chunk('dup')])).toThrow();
      expect(ops.getEvidenceChunk('fresh')).toBeUndefined();
    });

    it('filters by subgoal and hides pruned chunks', () => {
      ops.insertEvidenceChunks([chunk('a', 's1'), chunk('b', 's1'), chunk('c', 's2')]);
      ops.softDeleteEvidenceChunks(['b']);

      expect(ops.getEvidenceChunks().map((r) => r.id)).toEqual(['a', 'c']);
      expect(ops.getEvidenceChunks({ subgoalId: 's1' }).map((r) => r.id)).toEqual(['a']);
      expect(ops.getEvidenceChunks({ includePruned: true }).map((r) => r.id)).toEqual(['a', 'b', 'c']);
    });

    it('soft-deletes only live chunks', () => {
      ops.insertEvidenceChunks([chunk('a'), chunk('b')]);

      expect(ops.softDeleteEvidenceChunks(['a', 'missing'])).toEqual(['a']);
      expect(ops.softDeleteEvidenceChunks(['a', 'b'])).toEqual(['b']);
      expect(ops.countEvidenceChunks()).toEqual({ live: 0, pruned: 2 });
    });

    it('hard-deletes rows', () => {
      ops.insertEvidenceChunks([chunk('a'), chunk('b'), chunk('c')]);

      expect(ops.hardDeleteEvidenceChunks(['a', 'c', 'missing'])).toBe(2);
      expect(ops.getEvidenceChunks().map((r) => r.id)).toEqual(['b']);
    });

    it('purges soft-deleted rows', () => {
      ops.insertEvidenceChunks([chunk('a'), chunk('b')]);
      ops.softDeleteEvidenceChunks(['a']);

      expect(ops.purgePrunedEvidenceChunks()).toEqual(['a']);
      expect(ops.countEvidenceChunks()).toEqual({ live: 1, pruned: 0 });
    });
  });

  describe('sessions', () => {
    const base = {
      question: 'What is quantum computing?',
      planning_status: null,
      snapshot: '{}',
    };

    it('upserts and keeps the original created_at', () => {
      ops.upsertSession({
        ...base,
        id: 's1',
        state: 'planning_wait',
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-01T00:00:00.000Z',
      });
      ops.upsertSession({
        ...base,
        id: 's1',
        state: 'done',
        created_at: '2026-02-01T00:00:00.000Z',
        updated_at: '2026-02-01T00:00:00.000Z',
      });

      const row = ops.getSession('s1');
      expect(row?.state).toBe('done');
      expect(row?.created_at).toBe('2026-01-01T00:00:00.000Z');
      expect(row?.updated_at).toBe('2026-02-01T00:00:00.000Z');
    });

    it('lists sessions newest first', () => {
      ops.upsertSession({ ...base, id: 'old', state: 'done', created_at: 't', updated_at: '2026-01-01T00:00:00.000Z' });
      ops.upsertSession({ ...base, id: 'new', state: 'failed', created_at: 't', updated_at: '2026-03-01T00:00:00.000Z' });

      expect(ops.listSessions().map((s) => s.id)).toEqual(['new', 'old']);
      expect(ops.listSessions(1)).toEqual([
        {
          id: 'new',
          question: 'What is quantum computing?',
          state: 'failed',
          planningStatus: null,
          updatedAt: '2026-03-01T00:00:00.000Z',
        },
      ]);
    });

    it('deletes sessions', () => {
      ops.upsertSession({ ...base, id: 's1', state: 'done', created_at: 't', updated_at: 't' });

      expect(ops.deleteSession('s1')).toBe(true);
      expect(ops.deleteSession('s1')).toBe(false);
      expect(ops.getSession('s1')).toBeUndefined();
    });
  });

  it('reports storage stats', () => {
    ops.insertEvidenceChunks([chunk('a'), chunk('b')]);
    ops.softDeleteEvidenceChunks(['b']);
    ops.upsertSession({
      id: 's1',
      question: 'q',
      state: 'done',
      planning_status: null,
      snapshot: '{}',
      created_at: 't',
      updated_at: 't',
    });

    expect(ops.getStorageStats()).toEqual({
      liveChunks: 1,
      prunedChunks: 1,
      sessionCount: 1,
      databaseSize: 0,
    });
  });
});
