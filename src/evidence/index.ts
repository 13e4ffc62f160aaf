/**
 * Evidence Module
 *
 * Hybrid evidence index: in-memory vectors (Backend A) in front of the
 * SQLite chunk store (Backend B).
 */

export type {
  EvidenceChunk,
  ChunkInput,
  EvidenceText,
  IngestResult,
  IndexQueryOptions,
  IndexHit,
  PruneResult,
  PruneTarget,
  PrunePolicy,
  BackendStats,
  EvidenceBackend,
} from './types.js';
export { VectorIndex } from './vector-index.js';
export { DurableChunkStore } from './durable-store.js';
export {
  HybridEvidenceIndex,
  type HybridEvidenceIndexOptions,
  type IndexStats,
} from './hybrid-index.js';
export { createEvidenceIndex, type EvidenceIndexFactoryOptions } from './factory.js';
export { splitText, type SplitOptions } from './splitter.js';
export { cosineSimilarity, normalize } from './similarity.js';
