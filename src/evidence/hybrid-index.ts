/**
 * Hybrid Evidence Index
 *
 * Fronts Backend A (in-memory vectors) and Backend B (SQLite). Writes go to
 * both backends when dual-write is on; reads are answered by the single
 * configured read backend. Every mutation runs through a one-slot queue so
 * concurrent sessions never interleave writes; queries do not wait on it.
 *
 * @example
 * ```typescript
 * const index = new HybridEvidenceIndex({ memory, durable, embedder, ... });
 * await index.rebuild();
 * const { chunkIds, partial } = await index.ingest('step-1', chunks);
 * const hits = index.query(embedding, { topK: 5 });
 * ```
 */

import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import { IndexWriteError, ValidationError, type IndexBackendName } from '../errors/index.js';
import type { Embedder } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { DurableChunkStore } from './durable-store.js';
import { splitText } from './splitter.js';
import type {
  BackendStats,
  ChunkInput,
  EvidenceBackend,
  EvidenceChunk,
  EvidenceText,
  IndexHit,
  IndexQueryOptions,
  IngestResult,
  PrunePolicy,
  PruneResult,
  PruneTarget,
} from './types.js';
import type { VectorIndex } from './vector-index.js';

export interface HybridEvidenceIndexOptions {
  memory: VectorIndex;
  durable: DurableChunkStore;
  dualWrite: boolean;
  readBackend: IndexBackendName;
  prunePolicy: PrunePolicy;
  /** Needed by ingestEvidence and queryText */
  embedder?: Embedder;
  chunkSize?: number;
  chunkOverlap?: number;
  logger?: Logger;
}

export interface IndexStats {
  memory: BackendStats;
  sqlite: BackendStats;
  readBackend: IndexBackendName;
  dualWrite: boolean;
  prunePolicy: PrunePolicy;
}

export class HybridEvidenceIndex {
  private readonly memory: VectorIndex;
  private readonly durable: DurableChunkStore;
  private readonly logger: Logger;
  /** Single-slot mutation queue */
  private readonly mutex = pLimit(1);

  constructor(private readonly options: HybridEvidenceIndexOptions) {
    this.memory = options.memory;
    this.durable = options.durable;
    this.logger = options.logger ?? silentLogger;
  }

  get prunePolicy(): PrunePolicy {
    return this.options.prunePolicy;
  }

  private get reader(): EvidenceBackend {
    return this.options.readBackend === 'memory' ? this.memory : this.durable;
  }

  private get writeTargets(): EvidenceBackend[] {
    return this.options.dualWrite ? [this.memory, this.durable] : [this.reader];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Store chunks for a subgoal. A chunk counts as written only when every
   * target backend accepted it; failures are reported, never thrown.
   */
  ingest(subgoalId: string, chunks: ChunkInput[]): Promise<IngestResult> {
    return this.mutex(() => {
      const result: IngestResult = { chunkIds: [], written: [], partial: [] };
      const createdAt = new Date().toISOString();

      for (const input of chunks) {
        const chunk: EvidenceChunk = {
          id: `${subgoalId}:${randomUUID()}`,
          subgoalId,
          text: input.text,
          embedding: input.embedding,
          sourceUrl: input.sourceUrl,
          title: input.title,
          score: input.score ?? 0,
          metadata: input.metadata ?? {},
          createdAt,
        };
        result.chunkIds.push(chunk.id);

        let ok = true;
        for (const backend of this.writeTargets) {
          try {
            backend.put(chunk);
          } catch (error) {
            ok = false;
            const failure = new IndexWriteError(
              chunk.id,
              backend.name,
              error instanceof Error ? error : new Error(String(error))
            );
            result.partial.push(failure);
            this.logger.warn(failure.message);
          }
        }
        if (ok) {
          result.written.push(chunk.id);
        }
      }

      return result;
    });
  }

  /**
   * Split, embed and ingest evidence text.
   */
  async ingestEvidence(subgoalId: string, evidence: EvidenceText[], signal?: AbortSignal): Promise<IngestResult> {
    const embedder = this.requireEmbedder('ingestEvidence');
    const inputs: Array<Omit<ChunkInput, 'embedding'>> = [];

    for (const item of evidence) {
      const pieces = splitText(item.text, {
        chunkSize: this.options.chunkSize ?? 512,
        chunkOverlap: this.options.chunkOverlap ?? 50,
      });
      for (const [position, text] of pieces.entries()) {
        inputs.push({
          text,
          sourceUrl: item.sourceUrl,
          title: item.title,
          score: item.score,
          metadata: { ...item.metadata, position },
        });
      }
    }

    if (inputs.length === 0) {
      return { chunkIds: [], written: [], partial: [] };
    }

    const embeddings = await embedder.embed(
      inputs.map((input) => input.text),
      signal
    );
    return this.ingest(
      subgoalId,
      inputs.map((input, i) => ({ ...input, embedding: embeddings[i] ?? new Float32Array(embedder.dimensions) }))
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────────────────

  query(embedding: Float32Array, options: IndexQueryOptions): IndexHit[] {
    return this.reader.query(embedding, options);
  }

  async queryText(text: string, options: IndexQueryOptions, signal?: AbortSignal): Promise<IndexHit[]> {
    const [embedding] = await this.requireEmbedder('queryText').embed([text], signal);
    return embedding ? this.query(embedding, options) : [];
  }

  liveChunks(subgoalId?: string): EvidenceChunk[] {
    return this.reader.liveChunks(subgoalId);
  }

  stats(): IndexStats {
    return {
      memory: this.memory.stats(),
      sqlite: this.durable.stats(),
      readBackend: this.options.readBackend,
      dualWrite: this.options.dualWrite,
      prunePolicy: this.options.prunePolicy,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Pruning and maintenance
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Remove chunks from retrieval, by id list or predicate over live chunks.
   * Idempotent: ids already pruned (or already deleted) are reported in
   * `alreadyPruned`.
   */
  prune(target: PruneTarget): Promise<PruneResult> {
    return this.mutex(() => this.pruneNow(target));
  }

  /**
   * Prune a subgoal's chunks whose source score is below `threshold`.
   */
  auditAndPrune(subgoalId: string, threshold: number): Promise<PruneResult> {
    return this.mutex(() =>
      this.pruneNow((chunk) => chunk.subgoalId === subgoalId && chunk.score < threshold)
    );
  }

  /**
   * Reload Backend A from Backend B's live rows.
   *
   * @returns number of chunks loaded
   */
  rebuild(): Promise<number> {
    return this.mutex(() => this.rebuildNow());
  }

  /**
   * Turn every soft-pruned chunk into a hard delete.
   *
   * @returns number of durable rows removed
   */
  compact(): Promise<number> {
    return this.mutex(() => {
      const ids = this.durable.purgePruned();
      this.memory.hardDelete(ids);
      this.memory.purgePruned();
      return ids.length;
    });
  }

  private pruneNow(target: PruneTarget): PruneResult {
    const ids = typeof target === 'function' ? this.allLiveChunks().filter(target).map((c) => c.id) : target;
    const unique = [...new Set(ids)];

    const live = unique.filter((id) => this.memory.isLive(id) || this.durable.isLive(id));
    const alreadyPruned = unique.filter((id) => !live.includes(id));
    if (live.length === 0) {
      return { pruned: [], alreadyPruned };
    }

    if (this.options.prunePolicy === 'soft') {
      this.memory.softDelete(live);
      this.durable.softDelete(live);
    } else {
      this.durable.hardDelete(live);
      this.memory.hardDelete(live);
      // Without dual-write Backend B is not a full copy of Backend A
      if (this.options.dualWrite) {
        this.rebuildNow();
      }
    }

    this.logger.debug?.(`index: ${this.options.prunePolicy}-pruned ${live.length} chunk(s)`);
    return { pruned: live, alreadyPruned };
  }

  private rebuildNow(): number {
    const chunks = this.durable.liveChunks();
    this.memory.load(chunks);
    return chunks.length;
  }

  /** Live chunks across both backends, durable first */
  private allLiveChunks(): EvidenceChunk[] {
    const durable = this.durable.liveChunks();
    const seen = new Set(durable.map((c) => c.id));
    return [...durable, ...this.memory.liveChunks().filter((c) => !seen.has(c.id))];
  }

  private requireEmbedder(operation: string): Embedder {
    if (!this.options.embedder) {
      throw new ValidationError(`${operation} needs an embedder`, [
        'Pass an embedder when creating the evidence index',
      ]);
    }
    return this.options.embedder;
  }
}
