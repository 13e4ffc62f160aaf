/**
 * Hybrid evidence index tests (in-memory SQLite)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../database/migrate.js';
import { DatabaseOperations } from '../../database/operations.js';
import { IndexWriteError, ValidationError } from '../../errors/index.js';
import { HashingEmbedder } from '../../providers/hashing-embedder.js';
import { DurableChunkStore } from '../durable-store.js';
import { HybridEvidenceIndex, type HybridEvidenceIndexOptions } from '../hybrid-index.js';
import { VectorIndex } from '../vector-index.js';
import type { ChunkInput } from '../types.js';

function input(text: string, vector: number[], score = 0.5): ChunkInput {
  return { text, embedding: new Float32Array(vector), score, sourceUrl: `https://example.com/${text}` };
}

describe('HybridEvidenceIndex', () => {
  let db: Database.Database;
  let memory: VectorIndex;
  let durable: DurableChunkStore;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    memory = new VectorIndex();
    durable = new DurableChunkStore(new DatabaseOperations(db));
  });

  afterEach(() => {
    db.close();
  });

  function create(overrides: Partial<HybridEvidenceIndexOptions> = {}): HybridEvidenceIndex {
    return new HybridEvidenceIndex({
      memory,
      durable,
      dualWrite: true,
      readBackend: 'memory',
      prunePolicy: 'soft',
      ...overrides,
    });
  }

  describe('ingest', () => {
    it('writes every chunk to both backends', async () => {
      const index = create();

      const result = await index.ingest('step-1', [input('a', [1, 0]), input('b', [0, 1])]);

      expect(result.chunkIds).toHaveLength(2);
      expect(result.written).toEqual(result.chunkIds);
      expect(result.partial).toEqual([]);
      expect(result.chunkIds.every((id) => id.startsWith('step-1:'))).toBe(true);
      expect(memory.stats()).toEqual({ live: 2, pruned: 0 });
      expect(durable.stats()).toEqual({ live: 2, pruned: 0 });
    });

    it('assigns 10,000 distinct ids for one subgoal', async () => {
      const index = create({ dualWrite: false });
      const embedding = new Float32Array([1]);
      const chunks = Array.from({ length: 10_000 }, (_, i) => ({ text: `c${i}`, embedding }));

      const { chunkIds } = await index.ingest('step-1', chunks);

      expect(new Set(chunkIds).size).toBe(10_000);
    });

    it('reports the backend of a failed write and keeps going', async () => {
      const index = create();
      vi.spyOn(durable, 'put').mockImplementationOnce(() => {
        throw new Error('disk full');
      });

      const result = await index.ingest('step-1', [input('a', [1, 0]), input('b', [0, 1])]);

      const [failedId, okId] = result.chunkIds;
      expect(result.written).toEqual([okId]);
      expect(result.partial).toHaveLength(1);
      const failure = result.partial[0];
      expect(failure).toBeInstanceOf(IndexWriteError);
      expect(failure?.chunkId).toBe(failedId);
      expect(failure?.backend).toBe('sqlite');
      expect(failure?.message).toBe(`Failed to write chunk ${failedId} to sqlite backend: disk full`);
      expect(memory.stats().live).toBe(2);
      expect(durable.stats().live).toBe(1);
    });

    it('writes only the read backend without dual-write', async () => {
      const index = create({ dualWrite: false, readBackend: 'sqlite' });

      await index.ingest('step-1', [input('a', [1, 0])]);

      expect(memory.stats().live).toBe(0);
      expect(index.query(new Float32Array([1, 0]), { topK: 1 }).map((h) => h.chunk.text)).toEqual(['a']);
    });
  });

  describe('query', () => {
    it('answers from the configured backend with the same ranking', async () => {
      const viaMemory = create();
      await viaMemory.ingest('step-1', [input('a', [1, 0]), input('b', [1, 1]), input('c', [0, 1])]);
      const viaSqlite = create({ readBackend: 'sqlite' });

      const probe = new Float32Array([1, 0.1]);
      const fromMemory = viaMemory.query(probe, { topK: 2 }).map((h) => h.chunk.text);
      const fromSqlite = viaSqlite.query(probe, { topK: 2 }).map((h) => h.chunk.text);

      expect(fromMemory).toEqual(['a', 'b']);
      expect(fromSqlite).toEqual(['a', 'b']);
    });
  });

  describe('prune', () => {
    it('is idempotent under the soft policy', async () => {
      const index = create();
      const { chunkIds } = await index.ingest('step-1', [input('a', [1, 0]), input('b', [0, 1])]);
      const target = chunkIds.slice(0, 1);

      await expect(index.prune(target)).resolves.toEqual({ pruned: target, alreadyPruned: [] });
      await expect(index.prune(target)).resolves.toEqual({ pruned: [], alreadyPruned: target });

      expect(memory.stats()).toEqual({ live: 1, pruned: 1 });
      expect(durable.stats()).toEqual({ live: 1, pruned: 1 });
      expect(index.query(new Float32Array([1, 0]), { topK: 5 }).map((h) => h.chunk.text)).toEqual(['b']);
    });

    it('keeps soft-pruned chunks out after a rebuild', async () => {
      const index = create();
      const { chunkIds } = await index.ingest('step-1', [input('a', [1, 0]), input('b', [0, 1])]);
      await index.prune(chunkIds.slice(0, 1));

      await expect(index.rebuild()).resolves.toBe(1);

      expect(memory.liveChunks().map((c) => c.text)).toEqual(['b']);
      expect(memory.stats()).toEqual({ live: 1, pruned: 0 });
    });

    it('deletes from both backends and rebuilds under the hard policy', async () => {
      const index = create({ prunePolicy: 'hard' });
      const { chunkIds } = await index.ingest('step-1', [input('a', [1, 0]), input('b', [0, 1])]);

      const result = await index.prune(chunkIds.slice(1));

      expect(result.pruned).toEqual(chunkIds.slice(1));
      expect(durable.stats()).toEqual({ live: 1, pruned: 0 });
      expect(memory.stats()).toEqual({ live: 1, pruned: 0 });
      await expect(index.prune(chunkIds.slice(1))).resolves.toEqual({
        pruned: [],
        alreadyPruned: chunkIds.slice(1),
      });
    });

    it('accepts a predicate', async () => {
      const index = create();
      await index.ingest('step-1', [input('keep', [1, 0]), input('drop', [0, 1])]);

      const result = await index.prune((chunk) => chunk.text === 'drop');

      expect(result.pruned).toHaveLength(1);
      expect(index.liveChunks().map((c) => c.text)).toEqual(['keep']);
    });

    it('audits a subgoal by source score', async () => {
      const index = create();
      await index.ingest('step-1', [input('weak', [1, 0], 0.1), input('strong', [0, 1], 0.9)]);
      await index.ingest('step-2', [input('other', [1, 1], 0.1)]);

      const result = await index.auditAndPrune('step-1', 0.2);

      expect(result.pruned).toHaveLength(1);
      expect(index.liveChunks().map((c) => c.text)).toEqual(['strong', 'other']);
    });

    it('compacts soft-pruned chunks into hard deletes', async () => {
      const index = create();
      const { chunkIds } = await index.ingest('step-1', [input('a', [1, 0]), input('b', [0, 1])]);
      await index.prune(chunkIds.slice(0, 1));

      await expect(index.compact()).resolves.toBe(1);

      expect(durable.stats()).toEqual({ live: 1, pruned: 0 });
      expect(memory.stats()).toEqual({ live: 1, pruned: 0 });
    });
  });

  describe('text ingestion', () => {
    it('splits, embeds and finds evidence by text', async () => {
      const index = create({ embedder: new HashingEmbedder(128), chunkSize: 64, chunkOverlap: 0 });

      const result = await index.ingestEvidence('step-1', [
        {
          text: 'Qubits can be in superposition.\n\nEntanglement links qubits together.',
          sourceUrl: 'https://example.com/q',
          score: 0.8,
          metadata: { query: 'qubits' },
        },
        { text: 'Sourdough needs a starter culture.', sourceUrl: 'https://example.com/bread', score: 0.4 },
      ]);

      expect(result.written).toHaveLength(3);
      const chunks = index.liveChunks();
      expect(chunks.map((c) => c.text)).toEqual([
        'Qubits can be in superposition.',
        'Entanglement links qubits together.',
        'Sourdough needs a starter culture.',
      ]);
      expect(chunks[1]?.metadata).toEqual({ query: 'qubits', position: 1 });

      const hits = await index.queryText('qubits in superposition', { topK: 1 });
      expect(hits[0]?.chunk.text).toBe('Qubits can be in superposition.');
    });

    it('needs an embedder', async () => {
      await expect(create().queryText('q', { topK: 1 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it('reports stats per backend', async () => {
    const index = create({ prunePolicy: 'hard' });
    await index.ingest('step-1', [input('a', [1, 0])]);

    expect(index.stats()).toEqual({
      memory: { live: 1, pruned: 0 },
      sqlite: { live: 1, pruned: 0 },
      readBackend: 'memory',
      dualWrite: true,
      prunePolicy: 'hard',
    });
  });
});
