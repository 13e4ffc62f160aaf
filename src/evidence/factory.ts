/**
 * Builds the evidence index from config.
 */

import type { Config } from '../config/schema.js';
import { DatabaseOperations, getDatabase } from '../database/operations.js';
import type { Embedder } from '../providers/types.js';
import type { Logger } from '../utils/logger.js';
import { DurableChunkStore } from './durable-store.js';
import { HybridEvidenceIndex } from './hybrid-index.js';
import { VectorIndex } from './vector-index.js';

export interface EvidenceIndexFactoryOptions {
  embedder?: Embedder;
  /** Defaults to the shared database */
  database?: DatabaseOperations;
  logger?: Logger;
}

/**
 * Create the index and load Backend A from the durable store.
 */
export async function createEvidenceIndex(
  config: Config,
  options: EvidenceIndexFactoryOptions = {}
): Promise<HybridEvidenceIndex> {
  const index = new HybridEvidenceIndex({
    memory: new VectorIndex(),
    durable: new DurableChunkStore(options.database ?? getDatabase()),
    dualWrite: config.index.dual_write,
    readBackend: config.index.read_backend,
    prunePolicy: config.index.prune_policy,
    chunkSize: config.index.chunk_size,
    chunkOverlap: config.index.chunk_overlap,
    embedder: options.embedder,
    logger: options.logger,
  });
  await index.rebuild();
  return index;
}
