/**
 * Stage functions
 *
 * One function per active engine state. Each receives the session record,
 * mutates the fields the stage registry lists as its writes, and returns
 * the next state. Errors a stage does not absorb propagate to the run loop,
 * which ends the session as failed.
 */

import { StageFatalError } from '../errors/index.js';
import type { HybridEvidenceIndex } from '../evidence/hybrid-index.js';
import type { EvidenceText, IndexHit, IngestResult } from '../evidence/types.js';
import { compressEvidence, formatEvidence } from '../pipeline/compress.js';
import { renderAnswer, synthesizeAnswer } from '../pipeline/synthesize.js';
import type { EvidenceUnit } from '../pipeline/types.js';
import { validateEvidence } from '../pipeline/validate.js';
import { appendSteps, markSteps, stepForQuery } from '../planning/plan.js';
import { generateQueries } from '../planning/queries.js';
import { reflect } from '../planning/reflect.js';
import type { LLMClient } from '../providers/types.js';
import type { SearchCoordinator } from '../search/coordinator.js';
import type { QueryOutcome, SearchResult } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import type { ActiveState, EngineState, QuerySummary, ResearchEvent, SessionState } from './types.js';

export interface StageContext {
  llm: LLMClient;
  search: Pick<SearchCoordinator, 'fanOut' | 'providerNames'>;
  index: HybridEvidenceIndex;
  signal: AbortSignal;
  emit: (event: ResearchEvent) => void;
  logger: Logger;
}

export type StageHandler = (session: SessionState, ctx: StageContext) => Promise<EngineState>;

/** Index hits considered when a query may be answered from cached evidence */
const REUSE_TOP_K = 5;

function lowerSet(values: string[]): Set<string> {
  return new Set(values.map((value) => value.toLowerCase()));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Planning
// ============================================================================

async function init(session: SessionState): Promise<EngineState> {
  session.messages.push({ role: 'user', content: session.question });
  return 'generate_queries';
}

async function generateInitialQueries(session: SessionState, ctx: StageContext): Promise<EngineState> {
  const queries = await generateQueries(ctx.llm, session.question, session.config.initialQueryCount, {
    logger: ctx.logger,
    signal: ctx.signal,
  });
  session.plan = appendSteps(session.plan, queries);
  session.pendingQueries = queries;
  return 'planning';
}

async function planning(session: SessionState, ctx: StageContext): Promise<EngineState> {
  const waitForConfirmation = session.config.requirePlanningConfirmation;
  session.planningStatus = waitForConfirmation ? 'awaiting_confirmation' : 'auto_approved';
  ctx.emit({
    type: 'PlanningUpdated',
    sessionId: session.sessionId,
    planningStatus: session.planningStatus,
    plan: session.plan,
  });
  return waitForConfirmation ? 'planning_wait' : 'research_fan_out';
}

// ============================================================================
// Research round
// ============================================================================

/**
 * Answer queries from the evidence index where a live chunk is similar
 * enough. Only chunks with a source URL can be cited.
 */
async function reuseCachedEvidence(
  queries: string[],
  session: SessionState,
  ctx: StageContext
): Promise<Map<string, QueryOutcome>> {
  const reused = new Map<string, QueryOutcome>();
  for (const query of queries) {
    let hits: IndexHit[];
    try {
      hits = await ctx.index.queryText(
        query,
        { topK: REUSE_TOP_K, minScore: session.config.reuseMinScore },
        ctx.signal
      );
    } catch (error) {
      if (ctx.signal.aborted) {
        throw error;
      }
      // Providers answer the query instead
      ctx.logger.warn(`reuse: index lookup for "${query}" failed: ${errorMessage(error)}`);
      continue;
    }
    const results = hits.flatMap((hit): SearchResult[] =>
      hit.chunk.sourceUrl
        ? [
            {
              url: hit.chunk.sourceUrl,
              title: hit.chunk.title ?? hit.chunk.sourceUrl,
              snippet: hit.chunk.text,
              score: hit.chunk.score,
            },
          ]
        : []
    );
    if (results.length > 0) {
      ctx.logger.debug?.(`reuse: "${query}" answered from ${results.length} indexed chunk(s)`);
      reused.set(query, { status: 'ok', query, provider: 'index', results, attempts: [] });
    }
  }
  return reused;
}

function summarize(outcome: QueryOutcome): QuerySummary {
  return {
    query: outcome.query,
    status: outcome.status,
    provider: outcome.status === 'ok' ? outcome.provider : undefined,
    resultCount: outcome.results.length,
    attempts: outcome.attempts,
  };
}

async function researchFanOut(session: SessionState, ctx: StageContext): Promise<EngineState> {
  if (ctx.search.providerNames.length === 0) {
    throw new StageFatalError('research_fan_out', 'No search providers configured');
  }

  const queries = session.pendingQueries;
  session.plan = markSteps(session.plan, queries, 'in_progress');

  const reused = session.config.reuseCachedEvidence
    ? await reuseCachedEvidence(queries, session, ctx)
    : new Map<string, QueryOutcome>();
  const searched = await ctx.search.fanOut(
    queries.filter((query) => !reused.has(query)),
    { maxParallelism: session.config.maxParallel, signal: ctx.signal }
  );
  const byQuery = new Map(searched.map((outcome) => [outcome.query, outcome]));
  // Citation ids follow pendingQueries order, whichever source answered
  const outcomes = queries.flatMap((query) => {
    const outcome = reused.get(query) ?? byQuery.get(query);
    return outcome ? [outcome] : [];
  });

  const knownSources = session.sourcesGathered.size;
  session.rawResults = session.sourcesGathered.assignBatch(outcomes);
  session.executedQueries = [...session.executedQueries, ...queries];
  session.reusedQueries = [...reused.keys()];

  const failed = outcomes.filter((o) => o.status === 'failed').map((o) => o.query);
  const answered = outcomes.filter((o) => o.status === 'ok').map((o) => o.query);
  session.plan = markSteps(markSteps(session.plan, answered, 'done'), failed, 'blocked');

  ctx.emit({
    type: 'SearchBatchCompleted',
    sessionId: session.sessionId,
    round: session.researchLoopCount + 1,
    queries: outcomes.map(summarize),
    newSources: session.sourcesGathered.list().slice(knownSources),
  });
  return 'validate';
}

async function validate(session: SessionState, ctx: StageContext): Promise<EngineState> {
  const result = await validateEvidence(session.rawResults, {
    mode: session.config.validationMode,
    requireCitations: session.config.requireCitations,
    fuzzyCutoff: session.config.fuzzyCutoff,
    llm: ctx.llm,
    logger: ctx.logger,
    signal: ctx.signal,
  });
  session.validatedResults = result.validated;
  session.validationNotes = result.notes;

  ctx.emit({
    type: 'ValidationCompleted',
    sessionId: session.sessionId,
    kept: result.validated.length,
    rejected: session.rawResults.length - result.validated.length,
    notes: result.notes,
  });
  return 'compress';
}

function toEvidenceText(unit: EvidenceUnit): EvidenceText {
  return {
    text: unit.snippet,
    sourceUrl: unit.sourceUrl,
    title: unit.title,
    score: unit.score,
    metadata: { citationIndex: unit.citationIndex, query: unit.query },
  };
}

/**
 * Store the round's validated evidence under the plan step of its query,
 * then audit each step's chunks by source score.
 */
async function indexEvidence(session: SessionState, ctx: StageContext): Promise<void> {
  const reused = lowerSet(session.reusedQueries);
  const bySubgoal = new Map<string, EvidenceUnit[]>();
  for (const unit of session.validatedResults) {
    const step = stepForQuery(session.plan, unit.query);
    if (!step || reused.has(unit.query.toLowerCase())) {
      continue;
    }
    bySubgoal.set(step.id, [...(bySubgoal.get(step.id) ?? []), unit]);
  }
  if (bySubgoal.size === 0) {
    return;
  }

  let written = 0;
  let pruned = 0;
  const failures: string[] = [];
  for (const [subgoalId, units] of bySubgoal) {
    let result: IngestResult;
    try {
      result = await ctx.index.ingestEvidence(subgoalId, units.map(toEvidenceText), ctx.signal);
    } catch (error) {
      if (ctx.signal.aborted) {
        throw error;
      }
      // Nothing of this subgoal reached either backend; the round's evidence stays in the session
      const message = `${subgoalId}: ${errorMessage(error)}`;
      ctx.logger.warn(`index: ingest failed for ${message}`);
      failures.push(message);
      continue;
    }
    written += result.written.length;
    failures.push(...result.partial.map((failure) => failure.message));

    if (session.config.auditThreshold > 0) {
      const audit = await ctx.index.auditAndPrune(subgoalId, session.config.auditThreshold);
      pruned += audit.pruned.length;
    }
  }

  ctx.emit({ type: 'EvidenceIndexed', sessionId: session.sessionId, written, failures, pruned });
}

async function compress(session: SessionState, ctx: StageContext): Promise<EngineState> {
  const result = await compressEvidence([...session.compressedResults, ...session.validatedResults], {
    mode: session.config.compressionMode,
    tokenBudget: session.config.tokenBudget,
    question: session.question,
    llm: ctx.llm,
    logger: ctx.logger,
    signal: ctx.signal,
  });
  session.compressedResults = result.units;
  session.compressedSummary = result.summary;

  ctx.emit({
    type: 'CompressionCompleted',
    sessionId: session.sessionId,
    units: result.units.length,
    tokens: result.tokens,
    duplicatesRemoved: result.duplicatesRemoved,
    droppedForBudget: result.droppedForBudget,
    summarized: result.summary !== undefined,
  });

  await indexEvidence(session, ctx);
  return 'reflect';
}

async function reflectOnEvidence(session: SessionState, ctx: StageContext): Promise<EngineState> {
  session.researchLoopCount += 1;

  const notes = [session.compressedSummary ?? '', formatEvidence(session.compressedResults)]
    .filter((part) => part.length > 0)
    .join('\n\n');
  const result = await reflect(ctx.llm, notes, session.question, session.researchLoopCount, {
    maxFollowUps: session.config.maxFollowUps,
    logger: ctx.logger,
    signal: ctx.signal,
  });

  const executed = lowerSet(session.executedQueries);
  const followUps = result.followUpQueries.filter((query) => !executed.has(query.toLowerCase()));
  session.isSufficient = result.isSufficient;
  session.knowledgeGap = result.knowledgeGap;

  ctx.emit({
    type: 'ReflectionCompleted',
    sessionId: session.sessionId,
    round: session.researchLoopCount,
    isSufficient: result.isSufficient,
    knowledgeGap: result.knowledgeGap,
    followUpQueries: followUps,
  });

  if (
    result.isSufficient ||
    session.researchLoopCount >= session.config.maxResearchLoops ||
    followUps.length === 0
  ) {
    session.pendingQueries = [];
    return 'finalize';
  }

  session.plan = appendSteps(session.plan, followUps);
  session.pendingQueries = followUps;
  ctx.emit({
    type: 'PlanningUpdated',
    sessionId: session.sessionId,
    planningStatus: session.planningStatus,
    plan: session.plan,
  });
  return 'research_fan_out';
}

async function finalize(session: SessionState, ctx: StageContext): Promise<EngineState> {
  const answer = await synthesizeAnswer({
    question: session.question,
    units: session.compressedResults,
    summary: session.compressedSummary,
    sources: session.sourcesGathered.list(),
    llm: ctx.llm,
    signal: ctx.signal,
  });
  const rendered = renderAnswer(answer);

  session.outcome = { kind: answer.outcome, answer: rendered, citations: answer.citations };
  session.messages.push({ role: 'assistant', content: rendered });

  ctx.emit({
    type: 'Finalized',
    sessionId: session.sessionId,
    outcome: answer.outcome,
    answer: rendered,
    citations: answer.citations,
  });
  return 'done';
}

export const STAGE_HANDLERS: Record<ActiveState, StageHandler> = {
  init,
  generate_queries: generateInitialQueries,
  planning,
  research_fan_out: researchFanOut,
  validate,
  compress,
  reflect: reflectOnEvidence,
  finalize,
};
