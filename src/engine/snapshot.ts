/**
 * Session snapshots
 *
 * A snapshot is the JSON form of a SessionState. The citation map is stored
 * as an entry array. Snapshots are validated with zod when read back, since
 * they may have been written by an older build.
 */

import { z } from 'zod';
import { CitationRegistry } from '../pipeline/citations.js';
import { ResearchConfigSchema } from './config.js';
import { ENGINE_STATES, type SessionState, type SessionStatus } from './types.js';

const SourceRefSchema = z.object({
  id: z.number().int().positive(),
  url: z.string(),
  title: z.string(),
});

const EvidenceUnitSchema = z.object({
  sourceUrl: z.string(),
  title: z.string(),
  snippet: z.string(),
  score: z.number(),
  citationIndex: z.number().int(),
  query: z.string(),
});

const PlanStepSchema = z.object({
  id: z.string(),
  title: z.string(),
  query: z.string(),
  tool: z.literal('web_search'),
  status: z.enum(['pending', 'in_progress', 'done', 'blocked']),
});

const OutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('answered'), answer: z.string(), citations: z.array(SourceRefSchema) }),
  z.object({ kind: z.literal('no_evidence'), answer: z.string(), citations: z.array(SourceRefSchema) }),
  z.object({ kind: z.literal('failed'), reason: z.string() }),
  z.object({ kind: z.literal('cancelled') }),
]);

export const SessionSnapshotSchema = z.object({
  sessionId: z.string(),
  question: z.string(),
  messages: z.array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() })),
  plan: z.array(PlanStepSchema),
  pendingQueries: z.array(z.string()),
  executedQueries: z.array(z.string()),
  reusedQueries: z.array(z.string()),
  rawResults: z.array(EvidenceUnitSchema),
  validatedResults: z.array(EvidenceUnitSchema),
  compressedResults: z.array(EvidenceUnitSchema),
  compressedSummary: z.string().optional(),
  validationNotes: z.array(z.string()),
  sourcesGathered: z.array(z.tuple([z.string(), SourceRefSchema])),
  researchLoopCount: z.number().int().nonnegative(),
  planningStatus: z.enum(['awaiting_confirmation', 'confirmed', 'auto_approved']).nullable(),
  isSufficient: z.boolean().nullable(),
  knowledgeGap: z.string(),
  state: z.enum(ENGINE_STATES),
  outcome: OutcomeSchema.nullable(),
  config: ResearchConfigSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

export function toSnapshot(session: SessionState): SessionSnapshot {
  return {
    ...session,
    messages: session.messages.map((m) => ({ ...m })),
    plan: session.plan.map((step) => ({ ...step })),
    pendingQueries: [...session.pendingQueries],
    executedQueries: [...session.executedQueries],
    reusedQueries: [...session.reusedQueries],
    rawResults: [...session.rawResults],
    validatedResults: [...session.validatedResults],
    compressedResults: [...session.compressedResults],
    validationNotes: [...session.validationNotes],
    sourcesGathered: session.sourcesGathered.entries(),
    config: { ...session.config },
  };
}

export function fromSnapshot(snapshot: SessionSnapshot): SessionState {
  return {
    ...snapshot,
    sourcesGathered: new CitationRegistry(snapshot.sourcesGathered),
  };
}

/**
 * Validate an unknown value as a snapshot.
 *
 * @returns the snapshot, or the list of schema issues
 */
export function parseSnapshot(
  value: unknown
): { ok: true; snapshot: SessionSnapshot } | { ok: false; issues: string[] } {
  const result = SessionSnapshotSchema.safeParse(value);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  return { ok: true, snapshot: result.data };
}

export function sessionStatus(session: SessionState): SessionStatus {
  return {
    sessionId: session.sessionId,
    question: session.question,
    state: session.state,
    planningStatus: session.planningStatus,
    plan: session.plan.map((step) => ({ ...step })),
    evidenceCount: session.compressedResults.length,
    researchLoopCount: session.researchLoopCount,
    outcome: session.outcome,
  };
}
