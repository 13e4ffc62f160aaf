/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in the
 * _migrations table. Safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { validateRows } from './validation.js';

// ============================================================================
// Migration State Tracking
// ============================================================================

/**
 * Connections already migrated in this process. Keyed by connection so each
 * in-memory test database is migrated on its own.
 */
let migratedConnections = new WeakSet<Database.Database>();

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-evidence-chunks.sql',
    sql: `
-- Durable backend of the evidence index
CREATE TABLE IF NOT EXISTS evidence_chunks (
  id TEXT PRIMARY KEY,
  subgoal_id TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  source_url TEXT,
  title TEXT,
  score REAL NOT NULL DEFAULT 0,
  metadata TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  pruned_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_evidence_chunks_subgoal ON evidence_chunks(subgoal_id);
CREATE INDEX IF NOT EXISTS idx_evidence_chunks_live ON evidence_chunks(pruned_at);
    `.trim(),
  },
  {
    name: '002-research-sessions.sql',
    sql: `
-- Persisted session snapshots (plan, evidence, planning status)
CREATE TABLE IF NOT EXISTS research_sessions (
  id TEXT PRIMARY KEY,
  question TEXT NOT NULL,
  state TEXT NOT NULL,
  planning_status TEXT,
  snapshot TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_research_sessions_updated ON research_sessions(updated_at);
    `.trim(),
  },
];

const AppliedMigrationRowSchema = z.object({
  name: z.string(),
  applied_at: z.string(),
});

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Run all pending migrations.
 *
 * Failed migrations do not stop later ones from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations();
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  if (migratedConnections.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  ensureMigrationsTable(db);
  const done = new Set(getAppliedMigrations(db).map((m) => m.name));

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
      done.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only cache when everything applied, so the next run retries failures
  if (failed.length === 0) {
    migratedConnections.add(db);
  }

  return { applied, failed };
}

/**
 * List applied migrations in the order they ran.
 */
export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  if (!tableExists) {
    return [];
  }

  const rows = db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all();
  return validateRows(AppliedMigrationRowSchema, rows, '_migrations');
}

export function hasPendingMigrations(db: Database.Database = getDb()): boolean {
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}

/**
 * Forget which connections were migrated (tests).
 */
export function resetMigrationState(): void {
  migratedConnections = new WeakSet();
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
