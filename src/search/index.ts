/**
 * Search Module
 *
 * Retrieval provider adapters and the coordinator that routes queries
 * through them.
 */

export type {
  SearchResult,
  SearchProvider,
  ProviderSearchOptions,
  SearchResponse,
  QueryOutcome,
  FanOutOptions,
} from './types.js';
export { SearchCoordinator, type SearchCoordinatorOptions } from './coordinator.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
export {
  BraveProvider,
  DuckDuckGoProvider,
  TavilyProvider,
  createSearchProviders,
  fetchJson,
} from './providers/index.js';
