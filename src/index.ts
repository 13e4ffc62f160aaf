/**
 * Delve - Library Entry Point
 *
 * The CLI (`delve`) covers most uses:
 * ```bash
 * delve research "What is quantum computing?"
 * delve research "..." --confirm
 * delve resume <session> confirm-plan
 * ```
 *
 * This module exposes the engine and its building blocks for embedding
 * research runs in other programs.
 *
 * @example Running a session
 * ```typescript
 * import { createResearchEngine, loadConfig, runMigrations } from 'delve-research';
 *
 * const config = loadConfig();
 * runMigrations();
 * const engine = await createResearchEngine(config, { logger: console });
 * const { idle } = engine.start('How do qubits stay coherent?');
 * const status = await idle;
 * ```
 *
 * @packageDocumentation
 */

export * from './engine/index.js';
export * from './planning/index.js';
export * from './pipeline/index.js';
export * from './evidence/index.js';
export * from './search/index.js';
export * from './providers/index.js';
export * from './errors/index.js';

export {
  loadConfig,
  getDelveDir,
  getDbPath,
  getConfigPath,
  DEFAULT_CONFIG,
  type Config,
  type PartialConfig,
  type SearchProviderName,
} from './config/index.js';

export { runMigrations, getDatabase, closeDb, type StorageStats } from './database/index.js';

export type { Logger } from './utils/logger.js';
