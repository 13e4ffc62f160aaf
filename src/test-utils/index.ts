/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, createFakeLLM } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  FakeSearchProvider,
  createFakeLLM,
  createMockLogger,
  hangingProvider,
  resultsFor,
  type LLMHandler,
  type SearchScript,
} from './fakes.js';
