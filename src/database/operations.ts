/**
 * Database Operations
 *
 * Type-safe wrappers over the SQL used by the evidence store and the session
 * store. Handles Float32Array <-> Buffer conversion, JSON serialization and
 * transactions for batch writes.
 */

import { statSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { getDb } from './connection.js';
import { getDbPath } from '../config/paths.js';
import { embeddingToBlob } from './schema.js';
import type { EvidenceChunkInsert, ResearchSessionRecord } from './schema.js';
import {
  EvidenceChunkRowSchema,
  ResearchSessionRowSchema,
  validateRow,
  validateRows,
  countFrom,
  type EvidenceChunkRow,
  type ResearchSessionRow,
} from './validation.js';

/**
 * Filter for chunk reads.
 */
export interface EvidenceChunkFilter {
  subgoalId?: string;
  /** Include soft-pruned chunks (default false) */
  includePruned?: boolean;
}

export interface SessionListEntry {
  id: string;
  question: string;
  state: string;
  planningStatus: string | null;
  updatedAt: string;
}

export interface StorageStats {
  liveChunks: number;
  prunedChunks: number;
  sessionCount: number;
  databaseSize: number;
}

/**
 * SQLite `IN (...)` lists are capped by SQLITE_MAX_VARIABLE_NUMBER.
 */
const ID_BATCH_SIZE = 500;

function batches<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * High-level database operations wrapper.
 */
export class DatabaseOperations {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db ?? getDb();
  }

  /**
   * Database file size in bytes; 0 for in-memory or not-yet-created files.
   */
  getDatabaseSize(): number {
    if (this.db.memory) {
      return 0;
    }
    try {
      return statSync(getDbPath()).size;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Evidence chunks
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert a single chunk. Throws on id collision.
   */
  insertEvidenceChunk(chunk: EvidenceChunkInsert): void {
    this.db
      .prepare(
        `INSERT INTO evidence_chunks (id, subgoal_id, content, embedding, source_url, title, score, metadata, created_at)
         VALUES (@id, @subgoalId, @content, @embedding, @sourceUrl, @title, @score, @metadata, @createdAt)`
      )
      .run({
        id: chunk.id,
        subgoalId: chunk.subgoalId,
        content: chunk.content,
        embedding: embeddingToBlob(chunk.embedding),
        sourceUrl: chunk.sourceUrl ?? null,
        title: chunk.title ?? null,
        score: chunk.score,
        metadata: chunk.metadata ? JSON.stringify(chunk.metadata) : null,
        createdAt: chunk.createdAt ?? new Date().toISOString(),
      });
  }

  /**
   * Insert chunks in one transaction (all or nothing).
   */
  insertEvidenceChunks(chunks: EvidenceChunkInsert[]): void {
    this.db.transaction((items: EvidenceChunkInsert[]) => {
      for (const chunk of items) {
        this.insertEvidenceChunk(chunk);
      }
    })(chunks);
  }

  getEvidenceChunk(id: string): EvidenceChunkRow | undefined {
    const row = this.db.prepare('SELECT * FROM evidence_chunks WHERE id = ?').get(id);
    return row ? validateRow(EvidenceChunkRowSchema, row, `evidence_chunks.id=${id}`) : undefined;
  }

  /**
   * Chunks in insertion order, live only unless `includePruned`.
   */
  getEvidenceChunks(filter: EvidenceChunkFilter = {}): EvidenceChunkRow[] {
    const clauses: string[] = [];
    const params: string[] = [];

    if (!filter.includePruned) {
      clauses.push('pruned_at IS NULL');
    }
    if (filter.subgoalId !== undefined) {
      clauses.push('subgoal_id = ?');
      params.push(filter.subgoalId);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM evidence_chunks ${where} ORDER BY rowid`)
      .all(...params);
    return validateRows(EvidenceChunkRowSchema, rows, 'evidence_chunks');
  }

  /**
   * Stamp `pruned_at` on live chunks. Already-pruned or unknown ids are
   * left alone.
   *
   * @returns ids that changed from live to pruned
   */
  softDeleteEvidenceChunks(ids: string[], prunedAt = new Date().toISOString()): string[] {
    const changed: string[] = [];
    const stmt = this.db.prepare(
      'UPDATE evidence_chunks SET pruned_at = ? WHERE id = ? AND pruned_at IS NULL'
    );
    this.db.transaction((items: string[]) => {
      for (const id of items) {
        if (stmt.run(prunedAt, id).changes > 0) {
          changed.push(id);
        }
      }
    })(ids);
    return changed;
  }

  /**
   * Delete chunk rows.
   *
   * @returns number of rows deleted
   */
  hardDeleteEvidenceChunks(ids: string[]): number {
    let deleted = 0;
    this.db.transaction((items: string[]) => {
      for (const batch of batches(items, ID_BATCH_SIZE)) {
        const placeholders = batch.map(() => '?').join(', ');
        deleted += this.db
          .prepare(`DELETE FROM evidence_chunks WHERE id IN (${placeholders})`)
          .run(...batch).changes;
      }
    })(ids);
    return deleted;
  }

  /**
   * Delete every soft-pruned row.
   *
   * @returns ids of the deleted rows
   */
  purgePrunedEvidenceChunks(): string[] {
    const rows = this.db.prepare('SELECT id FROM evidence_chunks WHERE pruned_at IS NOT NULL').all();
    const ids = validateRows(EvidenceChunkRowSchema.pick({ id: true }), rows, 'evidence_chunks').map(
      (row) => row.id
    );
    this.hardDeleteEvidenceChunks(ids);
    return ids;
  }

  countEvidenceChunks(): { live: number; pruned: number } {
    const live = countFrom(
      this.db.prepare('SELECT COUNT(*) AS count FROM evidence_chunks WHERE pruned_at IS NULL').get(),
      'evidence_chunks'
    );
    const pruned = countFrom(
      this.db
        .prepare('SELECT COUNT(*) AS count FROM evidence_chunks WHERE pruned_at IS NOT NULL')
        .get(),
      'evidence_chunks'
    );
    return { live, pruned };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Research sessions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert or replace a session snapshot. `created_at` is kept from the
   * first save.
   */
  upsertSession(record: ResearchSessionRecord): void {
    this.db
      .prepare(
        `INSERT INTO research_sessions (id, question, state, planning_status, snapshot, created_at, updated_at)
         VALUES (@id, @question, @state, @planning_status, @snapshot, @created_at, @updated_at)
         ON CONFLICT(id) DO UPDATE SET
           question = excluded.question,
           state = excluded.state,
           planning_status = excluded.planning_status,
           snapshot = excluded.snapshot,
           updated_at = excluded.updated_at`
      )
      .run(record);
  }

  getSession(id: string): ResearchSessionRow | undefined {
    const row = this.db.prepare('SELECT * FROM research_sessions WHERE id = ?').get(id);
    return row
      ? validateRow(ResearchSessionRowSchema, row, `research_sessions.id=${id}`)
      : undefined;
  }

  /**
   * Most recently updated first.
   */
  listSessions(limit = 50): SessionListEntry[] {
    const rows = this.db
      .prepare(
        'SELECT id, question, state, planning_status, updated_at FROM research_sessions ORDER BY updated_at DESC, rowid DESC LIMIT ?'
      )
      .all(limit);
    return validateRows(
      ResearchSessionRowSchema.omit({ snapshot: true, created_at: true }),
      rows,
      'research_sessions'
    ).map((row) => ({
      id: row.id,
      question: row.question,
      state: row.state,
      planningStatus: row.planning_status,
      updatedAt: row.updated_at,
    }));
  }

  deleteSession(id: string): boolean {
    return this.db.prepare('DELETE FROM research_sessions WHERE id = ?').run(id).changes > 0;
  }

  getStorageStats(): StorageStats {
    const { live, pruned } = this.countEvidenceChunks();
    const sessionCount = countFrom(
      this.db.prepare('SELECT COUNT(*) AS count FROM research_sessions').get(),
      'research_sessions'
    );
    return {
      liveChunks: live,
      prunedChunks: pruned,
      sessionCount,
      databaseSize: this.getDatabaseSize(),
    };
  }
}

// ============================================================================
// Singleton
// ============================================================================

let dbOpsInstance: DatabaseOperations | null = null;

/**
 * Get the DatabaseOperations singleton over the shared connection.
 */
export function getDatabase(): DatabaseOperations {
  if (!dbOpsInstance) {
    dbOpsInstance = new DatabaseOperations();
  }
  return dbOpsInstance;
}

/**
 * Reset the database operations instance.
 * Primarily for testing.
 */
export function resetDatabase(): void {
  dbOpsInstance = null;
}
