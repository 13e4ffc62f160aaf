/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at ~/.delve/delve.db
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { getDbPath, getDelveDir } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;
let exitHookRegistered = false;

/**
 * Apply the connection settings every Delve database uses.
 */
export function configureConnection(connection: Database.Database): Database.Database {
  // Foreign keys are OFF by default in SQLite
  connection.pragma('foreign_keys = ON');
  // WAL lets the CLI read sessions while a research run is writing
  connection.pragma('journal_mode = WAL');
  return connection;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database and ~/.delve directory on first call.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const sessions = db.prepare('SELECT id FROM research_sessions').all();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  const dir = getDelveDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  db = configureConnection(new Database(getDbPath()));

  if (!exitHookRegistered) {
    // SIGINT is left to the CLI, which cancels running sessions first
    process.on('exit', () => closeDb());
    exitHookRegistered = true;
  }

  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
