/**
 * Builds a ResearchEngine wired to the configured providers, the shared
 * evidence index and the SQLite session store.
 */

import { loadEnv, type EnvVars } from '../config/env.js';
import type { Config } from '../config/schema.js';
import { getDatabase, type DatabaseOperations } from '../database/operations.js';
import { createEvidenceIndex } from '../evidence/factory.js';
import { createEmbedder, createLLMClient } from '../providers/factory.js';
import { SearchCoordinator } from '../search/coordinator.js';
import { createSearchProviders } from '../search/providers/index.js';
import { scopedLogger, type Logger } from '../utils/logger.js';
import { researchConfigFrom } from './config.js';
import { ResearchEngine } from './engine.js';
import { SqliteSessionStore } from './session-store.js';

export interface EngineFactoryOptions {
  env?: EnvVars;
  database?: DatabaseOperations;
  logger: Logger;
}

export async function createResearchEngine(
  config: Config,
  options: EngineFactoryOptions
): Promise<ResearchEngine> {
  const env = options.env ?? loadEnv();
  const database = options.database ?? getDatabase();
  const { logger } = options;
  const breaker = config.search.circuit_breaker;

  const llm = createLLMClient(config, { env, logger: scopedLogger(logger, 'llm') });
  const index = await createEvidenceIndex(config, {
    embedder: createEmbedder(config, { env, logger: scopedLogger(logger, 'embed') }),
    database,
    logger: scopedLogger(logger, 'index'),
  });
  const search = new SearchCoordinator(createSearchProviders(config.search.provider_priority, env), {
    timeoutMs: config.search.timeout_ms,
    maxResults: config.search.max_results,
    maxParallel: config.search.max_parallel,
    circuitBreaker: breaker.enabled
      ? {
          failureThreshold: breaker.failure_threshold,
          windowMs: breaker.window_ms,
          cooldownMs: breaker.cooldown_ms,
        }
      : undefined,
    logger: scopedLogger(logger, 'search'),
  });

  return new ResearchEngine({
    llm,
    search,
    index,
    config: researchConfigFrom(config),
    store: new SqliteSessionStore(database),
    logger,
  });
}
