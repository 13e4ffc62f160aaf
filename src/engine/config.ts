/**
 * Per-session research settings
 *
 * The engine runs each session with a flat, camelCase view of the config
 * file. The resolved settings are stored in the session snapshot, so a
 * resumed session keeps the settings it started with.
 */

import { z } from 'zod';
import type { Config } from '../config/schema.js';
import { ValidationError } from '../errors/index.js';

export const ResearchConfigSchema = z.object({
  maxResearchLoops: z.number().int().min(1),
  initialQueryCount: z.number().int().min(1),
  /** Follow-up queries kept per reflection */
  maxFollowUps: z.number().int().min(1),
  requirePlanningConfirmation: z.boolean(),
  tokenBudget: z.number().int().min(1),
  maxParallel: z.number().int().min(1),
  validationMode: z.enum(['heuristic', 'hybrid']),
  requireCitations: z.boolean(),
  fuzzyCutoff: z.number().min(0).max(1),
  compressionMode: z.enum(['extractive', 'tiered']),
  /** Chunks scored below this are pruned after ingestion */
  auditThreshold: z.number().min(0).max(1),
  reuseCachedEvidence: z.boolean(),
  reuseMinScore: z.number().min(0).max(1),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

export function researchConfigFrom(config: Config): ResearchConfig {
  return {
    maxResearchLoops: config.research.max_research_loops,
    initialQueryCount: config.research.initial_query_count,
    maxFollowUps: config.research.initial_query_count,
    requirePlanningConfirmation: config.research.require_planning_confirmation,
    tokenBudget: config.research.token_budget,
    maxParallel: config.search.max_parallel,
    validationMode: config.validation.mode,
    requireCitations: config.validation.require_citations,
    fuzzyCutoff: config.validation.fuzzy_cutoff,
    compressionMode: config.compression.mode,
    auditThreshold: config.index.audit_threshold,
    reuseCachedEvidence: config.index.reuse_cached_evidence,
    reuseMinScore: config.index.reuse_min_score,
  };
}

/**
 * Apply per-session overrides on top of the engine defaults.
 *
 * @throws ValidationError when an override is out of range
 */
export function withOverrides(
  base: ResearchConfig,
  overrides: Partial<ResearchConfig> = {}
): ResearchConfig {
  const result = ResearchConfigSchema.safeParse({ ...base, ...overrides });
  if (!result.success) {
    throw new ValidationError(
      'Invalid research settings',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
