/**
 * Configuration Schema
 *
 * Defines the shape of ~/.delve/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Names accepted in search.provider_priority
 */
export const SearchProviderNameSchema = z.enum(['tavily', 'brave', 'duckduckgo']);
export type SearchProviderName = z.infer<typeof SearchProviderNameSchema>;

/**
 * LLM and embedding capability
 */
export const LLMConfigSchema = z.object({
  model: z.string().min(1).describe('Chat model used for planning, validation and synthesis'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  timeout_ms: z.number().int().min(1000).max(600000).describe('Per-call timeout'),
  max_retries: z.number().int().min(0).max(10).describe('Retries on rate limits and timeouts'),
  embedding_provider: z
    .enum(['openai', 'hashing'])
    .describe('openai (API) or hashing (offline, deterministic)'),
  embedding_model: z.string().min(1).describe('Embedding model when provider is openai'),
  embedding_dimensions: z.number().int().min(16).max(4096).describe('Vector size'),
});

/**
 * Research loop controls
 */
export const ResearchConfigSchema = z.object({
  max_research_loops: z.number().int().min(1).max(20).describe('Hard bound on research rounds'),
  initial_query_count: z.number().int().min(1).max(20).describe('Queries generated up front'),
  require_planning_confirmation: z
    .boolean()
    .describe('Suspend for plan confirmation before searching'),
  token_budget: z.number().int().min(500).describe('Token ceiling for compressed evidence'),
});

export const CircuitBreakerConfigSchema = z.object({
  enabled: z.boolean().describe('Skip providers that keep failing'),
  failure_threshold: z.number().int().min(1).describe('Consecutive failures that open the circuit'),
  window_ms: z.number().int().min(1000).describe('Window the failures must fall in'),
  cooldown_ms: z.number().int().min(1000).describe('How long an open circuit skips the provider'),
});

/**
 * Search coordination
 */
export const SearchConfigSchema = z.object({
  provider_priority: z
    .array(SearchProviderNameSchema)
    .min(1)
    .describe('Providers tried in order for each query'),
  timeout_ms: z.number().int().min(100).max(120000).describe('Per-provider call timeout'),
  max_results: z.number().int().min(1).max(50).describe('Results requested per query'),
  max_parallel: z.number().int().min(1).max(32).describe('Upper bound on concurrent queries'),
  circuit_breaker: CircuitBreakerConfigSchema,
});

/**
 * Evidence index
 */
export const IndexConfigSchema = z
  .object({
    dual_write: z.boolean().describe('Write chunks to both backends'),
    read_backend: z.enum(['memory', 'sqlite']).describe('Backend that answers queries'),
    prune_policy: z.enum(['soft', 'hard']).describe('soft: hide chunks, hard: delete them'),
    chunk_size: z.number().int().min(64).max(8192).describe('Characters per chunk'),
    chunk_overlap: z.number().int().min(0).describe('Characters shared by adjacent chunks'),
    audit_threshold: z.number().min(0).max(1).describe('Chunks scored below this are pruned (0 disables)'),
    reuse_cached_evidence: z.boolean().describe('Answer queries from the index when possible'),
    reuse_min_score: z.number().min(0).max(1).describe('Similarity needed to reuse evidence'),
  })
  .refine((value) => value.chunk_overlap < value.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

export const ValidationConfigSchema = z.object({
  mode: z.enum(['heuristic', 'hybrid']).describe('hybrid adds an LLM claim check'),
  require_citations: z.boolean().describe('Reject evidence without a source URL'),
  fuzzy_cutoff: z.number().min(0).max(1).describe('Similarity for fuzzy keyword matches'),
});

export const CompressionConfigSchema = z.object({
  mode: z.enum(['extractive', 'tiered']).describe('tiered adds an LLM summary'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  research: ResearchConfigSchema,
  search: SearchConfigSchema,
  index: IndexConfigSchema,
  validation: ValidationConfigSchema,
  compression: CompressionConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Sparse user config (every field optional), merged over the defaults.
 */
export const PartialConfigSchema = z
  .object({
    llm: LLMConfigSchema.partial(),
    research: ResearchConfigSchema.partial(),
    search: SearchConfigSchema.extend({
      circuit_breaker: CircuitBreakerConfigSchema.partial(),
    }).partial(),
    index: IndexConfigSchema.innerType().partial(),
    validation: ValidationConfigSchema.partial(),
    compression: CompressionConfigSchema.partial(),
  })
  .partial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
