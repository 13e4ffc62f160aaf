/**
 * Orchestration Engine Types
 *
 * Session state, engine states, status views and the events streamed to
 * subscribers.
 */

import type { ProviderAttempt } from '../errors/index.js';
import type { CitationRegistry } from '../pipeline/citations.js';
import type { EvidenceUnit, SourceRef } from '../pipeline/types.js';
import type { PlanningStatus, PlanStep } from '../planning/types.js';
import type { ResearchConfig } from './config.js';

// ============================================================================
// STATES
// ============================================================================

export const ENGINE_STATES = [
  'init',
  'generate_queries',
  'planning',
  'planning_wait',
  'research_fan_out',
  'validate',
  'compress',
  'reflect',
  'finalize',
  'done',
  'failed',
  'cancelled',
] as const;

export type EngineState = (typeof ENGINE_STATES)[number];

/** States the run loop executes a stage for */
export type ActiveState = Exclude<EngineState, 'planning_wait' | 'done' | 'failed' | 'cancelled'>;

export type TerminalState = 'done' | 'failed' | 'cancelled';

export function isActiveState(state: EngineState): state is ActiveState {
  return state !== 'planning_wait' && !isTerminalState(state);
}

export function isTerminalState(state: EngineState): state is TerminalState {
  return state === 'done' || state === 'failed' || state === 'cancelled';
}

// ============================================================================
// SESSION
// ============================================================================

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type SessionOutcome =
  | {
      kind: 'answered' | 'no_evidence';
      /** Answer text followed by its source list */
      answer: string;
      citations: SourceRef[];
    }
  | { kind: 'failed'; reason: string }
  | { kind: 'cancelled' };

/**
 * Everything a research session knows. Stage functions receive this record
 * and mutate the fields listed as their writes in the stage registry.
 */
export interface SessionState {
  sessionId: string;
  question: string;
  /** Append-only conversation */
  messages: SessionMessage[];
  /** Steps are never removed, only appended and status-transitioned */
  plan: PlanStep[];
  /** Queries for the next search pass */
  pendingQueries: string[];
  /** Every query searched so far */
  executedQueries: string[];
  /** Queries of the current round answered from the evidence index */
  reusedQueries: string[];
  rawResults: EvidenceUnit[];
  validatedResults: EvidenceUnit[];
  compressedResults: EvidenceUnit[];
  compressedSummary?: string;
  validationNotes: string[];
  /** Canonical URL to citation; only grows */
  sourcesGathered: CitationRegistry;
  /** Completed research rounds */
  researchLoopCount: number;
  planningStatus: PlanningStatus | null;
  isSufficient: boolean | null;
  knowledgeGap: string;
  state: EngineState;
  outcome: SessionOutcome | null;
  config: ResearchConfig;
  createdAt: string;
  updatedAt: string;
}

/**
 * Read-only view returned by `status()` and `waitForIdle()`.
 */
export interface SessionStatus {
  sessionId: string;
  question: string;
  state: EngineState;
  planningStatus: PlanningStatus | null;
  plan: PlanStep[];
  /** Evidence units currently retained after compression */
  evidenceCount: number;
  researchLoopCount: number;
  outcome: SessionOutcome | null;
}

export interface SessionHandle {
  sessionId: string;
  /** Settles once the session suspends or terminates */
  idle: Promise<SessionStatus>;
}

// ============================================================================
// EVENTS
// ============================================================================

export interface QuerySummary {
  query: string;
  status: 'ok' | 'failed';
  /** Provider that answered, or "index" for reused evidence */
  provider?: string;
  resultCount: number;
  attempts: ProviderAttempt[];
}

export type ResearchEvent =
  | {
      type: 'PlanningUpdated';
      sessionId: string;
      planningStatus: PlanningStatus | null;
      plan: PlanStep[];
      /** Router feedback when a planning command caused the update */
      feedback?: string;
    }
  | {
      type: 'SearchBatchCompleted';
      sessionId: string;
      round: number;
      queries: QuerySummary[];
      /** Sources first seen in this batch */
      newSources: SourceRef[];
    }
  | {
      type: 'ValidationCompleted';
      sessionId: string;
      kept: number;
      rejected: number;
      notes: string[];
    }
  | {
      type: 'CompressionCompleted';
      sessionId: string;
      units: number;
      tokens: number;
      duplicatesRemoved: number;
      droppedForBudget: number;
      summarized: boolean;
    }
  | {
      type: 'EvidenceIndexed';
      sessionId: string;
      written: number;
      /** IndexWriteError messages */
      failures: string[];
      pruned: number;
    }
  | {
      type: 'ReflectionCompleted';
      sessionId: string;
      round: number;
      isSufficient: boolean;
      knowledgeGap: string;
      followUpQueries: string[];
    }
  | {
      type: 'Finalized';
      sessionId: string;
      outcome: 'answered' | 'no_evidence';
      answer: string;
      citations: SourceRef[];
    }
  | { type: 'Failed'; sessionId: string; reason: string }
  | { type: 'Cancelled'; sessionId: string };

export type ResearchEventType = ResearchEvent['type'];

export type ResearchEventListener = (event: ResearchEvent) => void;

/** Events after which a session emits nothing more */
export function isFinalEvent(event: ResearchEvent): boolean {
  return event.type === 'Finalized' || event.type === 'Failed' || event.type === 'Cancelled';
}
