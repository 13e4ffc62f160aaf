/**
 * Database Module
 *
 * SQLite storage for evidence chunks and research session snapshots.
 *
 * @example
 * ```ts
 * import { getDatabase, runMigrations } from './database/index.js';
 *
 * runMigrations();
 * const sessions = getDatabase().listSessions();
 * ```
 */

// Connection management (low-level)
export { getDb, closeDb, configureConnection } from './connection.js';

// Migration utilities
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  resetMigrationState,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Schema types and conversions
export type { EvidenceChunkRecord, EvidenceChunkInsert, ResearchSessionRecord } from './schema.js';
export { generateId, embeddingToBlob, blobToEmbedding } from './schema.js';

// Row validation
export {
  EvidenceChunkRowSchema,
  ResearchSessionRowSchema,
  RowValidationError,
  validateRow,
  validateRows,
  type EvidenceChunkRow,
  type ResearchSessionRow,
} from './validation.js';

// High-level operations
export {
  getDatabase,
  resetDatabase,
  DatabaseOperations,
  type EvidenceChunkFilter,
  type SessionListEntry,
  type StorageStats,
} from './operations.js';
