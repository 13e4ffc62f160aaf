/**
 * Default Configuration Values
 *
 * Used when no config.toml exists and for every field a user file leaves
 * out. The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  llm: {
    model: 'gpt-4o-mini',
    temperature: 0.2,
    timeout_ms: 60000,
    max_retries: 3,
    embedding_provider: 'openai',
    embedding_model: 'text-embedding-3-small',
    embedding_dimensions: 512,
  },

  research: {
    max_research_loops: 2,
    initial_query_count: 3,
    require_planning_confirmation: true,
    token_budget: 50000,
  },

  search: {
    provider_priority: ['tavily', 'brave', 'duckduckgo'],
    timeout_ms: 8000,
    max_results: 5,
    max_parallel: 4,
    circuit_breaker: {
      enabled: false,
      failure_threshold: 3,
      window_ms: 60000,
      cooldown_ms: 30000,
    },
  },

  index: {
    dual_write: true,
    read_backend: 'memory',
    prune_policy: 'soft',
    chunk_size: 512,
    chunk_overlap: 50,
    audit_threshold: 0,
    reuse_cached_evidence: false,
    reuse_min_score: 0.9,
  },

  validation: {
    mode: 'hybrid',
    require_citations: true,
    fuzzy_cutoff: 0.8,
  },

  compression: {
    mode: 'tiered',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.delve/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Delve Configuration
# Location: ~/.delve/config.toml
# API keys are read from the environment (OPENAI_API_KEY, TAVILY_API_KEY, BRAVE_API_KEY)

[llm]
model = "${DEFAULT_CONFIG.llm.model}"
temperature = ${DEFAULT_CONFIG.llm.temperature}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
max_retries = ${DEFAULT_CONFIG.llm.max_retries}
# "hashing" embeds offline without an API key
embedding_provider = "${DEFAULT_CONFIG.llm.embedding_provider}"
embedding_model = "${DEFAULT_CONFIG.llm.embedding_model}"
embedding_dimensions = ${DEFAULT_CONFIG.llm.embedding_dimensions}

[research]
max_research_loops = ${DEFAULT_CONFIG.research.max_research_loops}
initial_query_count = ${DEFAULT_CONFIG.research.initial_query_count}
require_planning_confirmation = ${DEFAULT_CONFIG.research.require_planning_confirmation}
token_budget = ${DEFAULT_CONFIG.research.token_budget}

[search]
provider_priority = [${DEFAULT_CONFIG.search.provider_priority.map((p) => `"${p}"`).join(', ')}]
timeout_ms = ${DEFAULT_CONFIG.search.timeout_ms}
max_results = ${DEFAULT_CONFIG.search.max_results}
max_parallel = ${DEFAULT_CONFIG.search.max_parallel}

[search.circuit_breaker]
enabled = ${DEFAULT_CONFIG.search.circuit_breaker.enabled}
failure_threshold = ${DEFAULT_CONFIG.search.circuit_breaker.failure_threshold}
window_ms = ${DEFAULT_CONFIG.search.circuit_breaker.window_ms}
cooldown_ms = ${DEFAULT_CONFIG.search.circuit_breaker.cooldown_ms}

[index]
dual_write = ${DEFAULT_CONFIG.index.dual_write}
read_backend = "${DEFAULT_CONFIG.index.read_backend}"
prune_policy = "${DEFAULT_CONFIG.index.prune_policy}"
chunk_size = ${DEFAULT_CONFIG.index.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.index.chunk_overlap}
audit_threshold = ${DEFAULT_CONFIG.index.audit_threshold}
reuse_cached_evidence = ${DEFAULT_CONFIG.index.reuse_cached_evidence}
reuse_min_score = ${DEFAULT_CONFIG.index.reuse_min_score}

[validation]
# "heuristic" skips the LLM claim check
mode = "${DEFAULT_CONFIG.validation.mode}"
require_citations = ${DEFAULT_CONFIG.validation.require_citations}
fuzzy_cutoff = ${DEFAULT_CONFIG.validation.fuzzy_cutoff}

[compression]
# "extractive" skips the LLM summary
mode = "${DEFAULT_CONFIG.compression.mode}"
`;
