/**
 * Evidence Index Types
 */

import type { IndexBackendName, IndexWriteError } from '../errors/index.js';

/**
 * A stored unit of evidence text with its embedding.
 */
export interface EvidenceChunk {
  /** "<subgoalId>:<uuid>" */
  id: string;
  /** Plan step the evidence was gathered for */
  subgoalId: string;
  text: string;
  embedding: Float32Array;
  sourceUrl?: string;
  title?: string;
  /** Source relevance score (0-1) */
  score: number;
  metadata: Record<string, unknown>;
  createdAt: string;
}

/**
 * Chunk content handed to `ingest`; the index assigns id and timestamp.
 */
export interface ChunkInput {
  text: string;
  embedding: Float32Array;
  sourceUrl?: string;
  title?: string;
  score?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Evidence text handed to `ingestEvidence`; split and embedded there.
 */
export interface EvidenceText {
  text: string;
  sourceUrl?: string;
  title?: string;
  score?: number;
  metadata?: Record<string, unknown>;
}

export interface IngestResult {
  /** Ids assigned to every input chunk, in input order */
  chunkIds: string[];
  /** Ids written to every target backend */
  written: string[];
  /** One entry per failed (chunk, backend) write */
  partial: IndexWriteError[];
}

export interface IndexQueryOptions {
  topK: number;
  subgoalId?: string;
  /** Minimum cosine similarity */
  minScore?: number;
}

export interface IndexHit {
  chunk: EvidenceChunk;
  similarity: number;
}

export interface PruneResult {
  /** Ids that went from live to pruned in this call */
  pruned: string[];
  /** Ids that were already pruned (or no longer exist) */
  alreadyPruned: string[];
}

export type PruneTarget = string[] | ((chunk: EvidenceChunk) => boolean);

export type PrunePolicy = 'soft' | 'hard';

export interface BackendStats {
  live: number;
  pruned: number;
}

/**
 * Storage behind the hybrid index. Writes throw on failure; the hybrid
 * index turns those into IndexWriteError entries.
 */
export interface EvidenceBackend {
  readonly name: IndexBackendName;
  put(chunk: EvidenceChunk): void;
  query(embedding: Float32Array, options: IndexQueryOptions): IndexHit[];
  /** Live chunks, optionally for one subgoal, in insertion order */
  liveChunks(subgoalId?: string): EvidenceChunk[];
  isLive(id: string): boolean;
  /** @returns ids that changed from live to pruned */
  softDelete(ids: string[]): string[];
  hardDelete(ids: string[]): void;
  stats(): BackendStats;
}
