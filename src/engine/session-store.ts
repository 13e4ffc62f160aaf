/**
 * Session persistence
 *
 * The engine saves the full session snapshot on every state transition, so
 * a session suspended in planning_wait survives a process restart.
 */

import type { DatabaseOperations } from '../database/operations.js';
import { SessionNotFoundError, SessionStateError } from '../errors/index.js';
import { parseSnapshot, type SessionSnapshot } from './snapshot.js';
import { isTerminalState } from './types.js';

export interface SessionSummary {
  sessionId: string;
  question: string;
  state: string;
  planningStatus: string | null;
  updatedAt: string;
}

export interface SessionStore {
  load(sessionId: string): Promise<SessionSnapshot | null>;
  save(sessionId: string, snapshot: SessionSnapshot): Promise<void>;
  /** Most recently updated first */
  list(limit?: number): Promise<SessionSummary[]>;
}

function decode(sessionId: string, json: string): SessionSnapshot {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SessionStateError(sessionId, 'unknown', `Stored session is not valid JSON: ${message}`);
  }
  const parsed = parseSnapshot(value);
  if (!parsed.ok) {
    throw new SessionStateError(
      sessionId,
      'unknown',
      `Stored session does not match the snapshot schema: ${parsed.issues.join('; ')}`
    );
  }
  return parsed.snapshot;
}

/**
 * SQLite-backed store over the `research_sessions` table.
 */
export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: DatabaseOperations) {}

  async load(sessionId: string): Promise<SessionSnapshot | null> {
    const row = this.db.getSession(sessionId);
    return row ? decode(sessionId, row.snapshot) : null;
  }

  async save(sessionId: string, snapshot: SessionSnapshot): Promise<void> {
    this.db.upsertSession({
      id: sessionId,
      question: snapshot.question,
      state: snapshot.state,
      planning_status: snapshot.planningStatus,
      snapshot: JSON.stringify(snapshot),
      created_at: snapshot.createdAt,
      updated_at: snapshot.updatedAt,
    });
  }

  async list(limit = 50): Promise<SessionSummary[]> {
    return this.db.listSessions(limit).map((entry) => ({
      sessionId: entry.id,
      question: entry.question,
      state: entry.state,
      planningStatus: entry.planningStatus,
      updatedAt: entry.updatedAt,
    }));
  }
}

/**
 * Process-local store. Snapshots are kept as JSON text so reads go through
 * the same decoding as the SQLite store.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly rows = new Map<string, { json: string; summary: SessionSummary }>();

  async load(sessionId: string): Promise<SessionSnapshot | null> {
    const row = this.rows.get(sessionId);
    return row ? decode(sessionId, row.json) : null;
  }

  async save(sessionId: string, snapshot: SessionSnapshot): Promise<void> {
    // Re-insert so iteration order follows the latest save
    this.rows.delete(sessionId);
    this.rows.set(sessionId, {
      json: JSON.stringify(snapshot),
      summary: {
        sessionId,
        question: snapshot.question,
        state: snapshot.state,
        planningStatus: snapshot.planningStatus,
        updatedAt: snapshot.updatedAt,
      },
    });
  }

  async list(limit = 50): Promise<SessionSummary[]> {
    return [...this.rows.values()]
      .reverse()
      .slice(0, limit)
      .map((row) => ({ ...row.summary }));
  }
}

/**
 * Mark a stored session cancelled without loading it into an engine. Used
 * for sessions left suspended by a process that has exited.
 *
 * @throws SessionNotFoundError
 * @throws SessionStateError when the session already finished
 */
export async function cancelStoredSession(
  store: SessionStore,
  sessionId: string,
  now: Date = new Date()
): Promise<SessionSnapshot> {
  const snapshot = await store.load(sessionId);
  if (!snapshot) {
    throw new SessionNotFoundError(sessionId);
  }
  if (isTerminalState(snapshot.state)) {
    throw new SessionStateError(sessionId, snapshot.state, 'Session has already finished');
  }
  const cancelled: SessionSnapshot = {
    ...snapshot,
    state: 'cancelled',
    outcome: { kind: 'cancelled' },
    updatedAt: now.toISOString(),
  };
  await store.save(sessionId, cancelled);
  return cancelled;
}
