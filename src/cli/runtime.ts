/**
 * Command runtime
 *
 * Opens the pieces a command needs from the config file and the shared
 * database. Commands import these instead of the factories so tests can
 * replace them with vi.mock.
 */

import { loadConfig } from '../config/loader.js';
import { runMigrations } from '../database/migrate.js';
import { getDatabase } from '../database/operations.js';
import type { ResearchEngine } from '../engine/engine.js';
import { createResearchEngine } from '../engine/factory.js';
import { SqliteSessionStore, type SessionStore } from '../engine/session-store.js';
import { createEvidenceIndex } from '../evidence/factory.js';
import type { HybridEvidenceIndex } from '../evidence/hybrid-index.js';
import { createEmbedder } from '../providers/factory.js';
import { scopedLogger } from '../utils/logger.js';
import type { CommandContext } from './types.js';

/**
 * Engine with providers, evidence index and session store.
 *
 * @throws APIKeyError when no LLM endpoint is configured
 */
export async function openEngine(ctx: CommandContext): Promise<ResearchEngine> {
  const config = loadConfig();
  runMigrations();
  ctx.debug(`LLM model: ${config.llm.model}`);
  ctx.debug(`Search providers: ${config.search.provider_priority.join(', ')}`);
  return createResearchEngine(config, { logger: ctx });
}

/**
 * Session store without providers, for commands that only read or cancel
 * stored sessions.
 */
export function openSessionStore(): SessionStore {
  runMigrations();
  return new SqliteSessionStore(getDatabase());
}

/**
 * Evidence index loaded from the database. The embedder is only created
 * when a command runs text queries, so maintenance works without keys.
 */
export async function openIndex(
  ctx: CommandContext,
  options: { withEmbedder?: boolean } = {}
): Promise<HybridEvidenceIndex> {
  const config = loadConfig();
  runMigrations();
  const logger = scopedLogger(ctx, 'index');
  return createEvidenceIndex(config, {
    embedder: options.withEmbedder ? createEmbedder(config, { logger: scopedLogger(ctx, 'embed') }) : undefined,
    logger,
  });
}
