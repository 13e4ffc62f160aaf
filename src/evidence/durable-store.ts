/**
 * Backend B: durable chunk store
 *
 * Evidence chunks in the SQLite `evidence_chunks` table. Soft deletes stamp
 * `pruned_at`; queries compute cosine similarity over the live rows.
 */

import { z } from 'zod';
import { blobToEmbedding } from '../database/schema.js';
import type { DatabaseOperations } from '../database/operations.js';
import type { EvidenceChunkRow } from '../database/validation.js';
import { safeJsonParse } from '../utils/json.js';
import { cosineSimilarity } from './similarity.js';
import type {
  BackendStats,
  EvidenceBackend,
  EvidenceChunk,
  IndexHit,
  IndexQueryOptions,
} from './types.js';

const MetadataSchema = z.record(z.unknown());

function rowToChunk(row: EvidenceChunkRow): EvidenceChunk {
  return {
    id: row.id,
    subgoalId: row.subgoal_id,
    text: row.content,
    embedding: blobToEmbedding(row.embedding),
    sourceUrl: row.source_url ?? undefined,
    title: row.title ?? undefined,
    score: row.score,
    metadata: row.metadata ? safeJsonParse(row.metadata, MetadataSchema, {}) : {},
    createdAt: row.created_at,
  };
}

export class DurableChunkStore implements EvidenceBackend {
  readonly name = 'sqlite' as const;

  constructor(private readonly ops: DatabaseOperations) {}

  put(chunk: EvidenceChunk): void {
    this.ops.insertEvidenceChunk({
      id: chunk.id,
      subgoalId: chunk.subgoalId,
      content: chunk.text,
      embedding: chunk.embedding,
      sourceUrl: chunk.sourceUrl,
      title: chunk.title,
      score: chunk.score,
      metadata: chunk.metadata,
      createdAt: chunk.createdAt,
    });
  }

  query(embedding: Float32Array, options: IndexQueryOptions): IndexHit[] {
    return this.liveChunks(options.subgoalId)
      .map((chunk) => ({ chunk, similarity: cosineSimilarity(embedding, chunk.embedding) }))
      .filter((hit) => options.minScore === undefined || hit.similarity >= options.minScore)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, options.topK);
  }

  liveChunks(subgoalId?: string): EvidenceChunk[] {
    return this.ops.getEvidenceChunks({ subgoalId }).map(rowToChunk);
  }

  isLive(id: string): boolean {
    const row = this.ops.getEvidenceChunk(id);
    return row !== undefined && row.pruned_at === null;
  }

  softDelete(ids: string[]): string[] {
    return this.ops.softDeleteEvidenceChunks(ids);
  }

  hardDelete(ids: string[]): void {
    this.ops.hardDeleteEvidenceChunks(ids);
  }

  /** Delete every soft-pruned row; returns the deleted ids */
  purgePruned(): string[] {
    return this.ops.purgePrunedEvidenceChunks();
  }

  stats(): BackendStats {
    return this.ops.countEvidenceChunks();
  }
}
