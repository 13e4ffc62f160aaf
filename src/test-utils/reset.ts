/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset all singletons for test isolation.
 *
 * ORDER MATTERS:
 * 1. Reset the database operations singleton (it holds the connection)
 * 2. Close the database connection
 * 3. Clear the environment cache last, so the next command re-reads keys
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { resetDatabase, closeDb } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all application singletons for test isolation.
 *
 * Call this in `beforeEach` for complete isolation, or `afterAll` for
 * cleanup. After a reset the next command behaves like a fresh process.
 */
export function resetAll(): void {
  resetDatabase();
  closeDb();
  _clearEnvCache();
}
