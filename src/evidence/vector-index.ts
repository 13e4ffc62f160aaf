/**
 * Backend A: in-memory vector index
 *
 * Brute-force cosine search over unit-normalized vectors. Soft-pruned ids
 * leave the live set but keep their vectors until hard-deleted or the index
 * is reloaded. Nothing here survives a restart; the hybrid index rebuilds it
 * from the durable store.
 */

import type {
  BackendStats,
  EvidenceBackend,
  EvidenceChunk,
  IndexHit,
  IndexQueryOptions,
} from './types.js';
import { dot, normalize } from './similarity.js';

interface Entry {
  chunk: EvidenceChunk;
  unit: Float32Array;
}

export class VectorIndex implements EvidenceBackend {
  readonly name = 'memory' as const;

  /** Insertion-ordered */
  private entries = new Map<string, Entry>();
  private live = new Set<string>();

  put(chunk: EvidenceChunk): void {
    this.entries.set(chunk.id, { chunk, unit: normalize(chunk.embedding) });
    this.live.add(chunk.id);
  }

  query(embedding: Float32Array, options: IndexQueryOptions): IndexHit[] {
    const unit = normalize(embedding);
    const hits: IndexHit[] = [];

    for (const id of this.live) {
      const entry = this.entries.get(id);
      if (!entry) continue;
      if (options.subgoalId !== undefined && entry.chunk.subgoalId !== options.subgoalId) continue;

      const similarity = dot(unit, entry.unit);
      if (options.minScore !== undefined && similarity < options.minScore) continue;
      hits.push({ chunk: entry.chunk, similarity });
    }

    return hits.sort((a, b) => b.similarity - a.similarity).slice(0, options.topK);
  }

  liveChunks(subgoalId?: string): EvidenceChunk[] {
    const chunks: EvidenceChunk[] = [];
    for (const [id, entry] of this.entries) {
      if (this.live.has(id) && (subgoalId === undefined || entry.chunk.subgoalId === subgoalId)) {
        chunks.push(entry.chunk);
      }
    }
    return chunks;
  }

  isLive(id: string): boolean {
    return this.live.has(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  softDelete(ids: string[]): string[] {
    return ids.filter((id) => this.live.delete(id));
  }

  hardDelete(ids: string[]): void {
    for (const id of ids) {
      this.entries.delete(id);
      this.live.delete(id);
    }
  }

  /** Drop vectors of soft-pruned chunks */
  purgePruned(): number {
    let purged = 0;
    for (const id of [...this.entries.keys()]) {
      if (!this.live.has(id)) {
        this.entries.delete(id);
        purged++;
      }
    }
    return purged;
  }

  /** Replace the contents with the given live chunks */
  load(chunks: EvidenceChunk[]): void {
    this.entries.clear();
    this.live.clear();
    for (const chunk of chunks) {
      this.put(chunk);
    }
  }

  stats(): BackendStats {
    return { live: this.live.size, pruned: this.entries.size - this.live.size };
  }
}
