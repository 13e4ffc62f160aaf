/**
 * Stage registry
 *
 * Static description of every engine state: what it does and which
 * session fields it reads and writes. Printed by `delve stages`; the run
 * loop dispatches through its own handler table and never consults this.
 */

import type { EngineState, SessionState } from './types.js';

export type SessionField = keyof SessionState;

export interface StageDefinition {
  state: EngineState;
  description: string;
  reads: readonly SessionField[];
  writes: readonly SessionField[];
  /** States the stage can hand over to */
  next: readonly EngineState[];
}

export const STAGE_REGISTRY: readonly StageDefinition[] = [
  {
    state: 'init',
    description: 'Record the question as the first user message',
    reads: ['question'],
    writes: ['messages'],
    next: ['generate_queries'],
  },
  {
    state: 'generate_queries',
    description: 'Ask the LLM for the initial search queries and turn them into plan steps',
    reads: ['question', 'config'],
    writes: ['plan', 'pendingQueries'],
    next: ['planning'],
  },
  {
    state: 'planning',
    description: 'Suspend for plan confirmation or approve the plan automatically',
    reads: ['config', 'plan'],
    writes: ['planningStatus'],
    next: ['planning_wait', 'research_fan_out'],
  },
  {
    state: 'planning_wait',
    description: 'Suspended until resume() receives a planning command',
    reads: ['planningStatus'],
    writes: ['planningStatus', 'messages'],
    next: ['planning_wait', 'research_fan_out', 'cancelled'],
  },
  {
    state: 'research_fan_out',
    description: 'Search every pending query in parallel and assign citations',
    reads: ['pendingQueries', 'plan', 'config', 'sourcesGathered'],
    writes: ['rawResults', 'sourcesGathered', 'executedQueries', 'reusedQueries', 'plan'],
    next: ['validate'],
  },
  {
    state: 'validate',
    description: 'Drop uncited and off-topic evidence, optionally confirm claims with the LLM',
    reads: ['rawResults', 'config'],
    writes: ['validatedResults', 'validationNotes'],
    next: ['compress'],
  },
  {
    state: 'compress',
    description: 'Deduplicate and fit evidence to the token budget, then index it',
    reads: ['validatedResults', 'compressedResults', 'question', 'config', 'plan', 'reusedQueries'],
    writes: ['compressedResults', 'compressedSummary'],
    next: ['reflect'],
  },
  {
    state: 'reflect',
    description: 'Judge sufficiency and plan follow-up queries',
    reads: ['compressedResults', 'compressedSummary', 'question', 'executedQueries', 'config'],
    writes: ['researchLoopCount', 'isSufficient', 'knowledgeGap', 'pendingQueries', 'plan'],
    next: ['research_fan_out', 'finalize'],
  },
  {
    state: 'finalize',
    description: 'Write the cited answer',
    reads: ['question', 'compressedResults', 'compressedSummary', 'sourcesGathered'],
    writes: ['outcome', 'messages'],
    next: ['done'],
  },
  {
    state: 'done',
    description: 'Answer delivered',
    reads: [],
    writes: [],
    next: [],
  },
  {
    state: 'failed',
    description: 'A stage raised an error the stage did not absorb',
    reads: [],
    writes: ['outcome'],
    next: [],
  },
  {
    state: 'cancelled',
    description: 'Cancelled by the caller; partially indexed evidence is kept',
    reads: [],
    writes: ['outcome'],
    next: [],
  },
];

export function getStage(state: EngineState): StageDefinition | undefined {
  return STAGE_REGISTRY.find((stage) => stage.state === state);
}
