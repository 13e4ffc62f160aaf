/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite tables, plus the
 * Float32Array <-> BLOB conversions.
 */

import { randomUUID } from 'node:crypto';

// ============================================================================
// evidence_chunks (Backend B of the evidence index)
// ============================================================================

export interface EvidenceChunkRecord {
  /** "<subgoalId>:<uuid>" */
  id: string;
  /** Plan step the chunk was gathered for */
  subgoal_id: string;
  content: string;
  /** Float32Array stored as BLOB */
  embedding: Buffer;
  source_url: string | null;
  title: string | null;
  /** Source relevance score reported by the provider (0-1) */
  score: number;
  /** JSON object */
  metadata: string | null;
  created_at: string;
  /** Set when the chunk was soft-pruned; NULL while live */
  pruned_at: string | null;
}

export interface EvidenceChunkInsert {
  id: string;
  subgoalId: string;
  content: string;
  embedding: Float32Array;
  sourceUrl?: string;
  title?: string;
  score: number;
  metadata?: Record<string, unknown>;
  createdAt?: string;
}

// ============================================================================
// research_sessions
// ============================================================================

export interface ResearchSessionRecord {
  id: string;
  question: string;
  /** Engine state at the last save */
  state: string;
  planning_status: string | null;
  /** JSON snapshot of the full session state */
  snapshot: string;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Generate a new UUID for database records.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Convert Float32Array to Buffer for BLOB storage.
 * Respects views into larger buffers.
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert Buffer from BLOB back to Float32Array.
 *
 * Copies first: better-sqlite3 buffers are not guaranteed to be 4-byte
 * aligned, which a Float32Array view requires.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4));
}
