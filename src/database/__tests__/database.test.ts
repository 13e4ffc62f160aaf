/**
 * Database Module Tests
 *
 * Migrations and BLOB conversion, against in-memory databases.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { embeddingToBlob, blobToEmbedding, generateId } from '../schema.js';
import {
  runMigrations,
  getAppliedMigrations,
  hasPendingMigrations,
  getMigrationCount,
  resetMigrationState,
} from '../migrate.js';

describe('embedding conversion', () => {
  it('round-trips a Float32Array through a BLOB', () => {
    const embedding = new Float32Array([0.25, -1.5, 3]);
    const restored = blobToEmbedding(embeddingToBlob(embedding));

    expect(Array.from(restored)).toEqual([0.25, -1.5, 3]);
  });

  it('stores only the viewed slice of a larger buffer', () => {
    const backing = new Float32Array([9, 1, 2, 9]);
    const view = backing.subarray(1, 3);

    expect(embeddingToBlob(view).byteLength).toBe(8);
    expect(Array.from(blobToEmbedding(embeddingToBlob(view)))).toEqual([1, 2]);
  });

  it('handles unaligned buffers', () => {
    const raw = Buffer.alloc(9);
    const aligned = embeddingToBlob(new Float32Array([7, 8]));
    aligned.copy(raw, 1);

    expect(Array.from(blobToEmbedding(raw.subarray(1)))).toEqual([7, 8]);
  });
});

describe('generateId', () => {
  it('returns distinct UUIDs', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));
    expect(ids.size).toBe(100);
  });
});

describe('runMigrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    resetMigrationState();
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('applies every migration once', () => {
    expect(hasPendingMigrations(db)).toBe(true);

    const result = runMigrations(db);

    expect(result.failed).toEqual([]);
    expect(result.applied).toEqual(['001-evidence-chunks.sql', '002-research-sessions.sql']);
    expect(getAppliedMigrations(db)).toHaveLength(getMigrationCount());
    expect(hasPendingMigrations(db)).toBe(false);
  });

  it('is a no-op on the second run', () => {
    runMigrations(db);
    expect(runMigrations(db)).toEqual({ applied: [], failed: [] });
  });

  it('skips recorded migrations after a state reset', () => {
    runMigrations(db);
    resetMigrationState();

    expect(runMigrations(db).applied).toEqual([]);
  });

  it('creates the evidence and session tables', () => {
    runMigrations(db);
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => JSON.stringify(row));

    expect(tables).toContain(JSON.stringify({ name: 'evidence_chunks' }));
    expect(tables).toContain(JSON.stringify({ name: 'research_sessions' }));
  });

  it('reports no applied migrations on an empty database', () => {
    expect(getAppliedMigrations(db)).toEqual([]);
  });
});
