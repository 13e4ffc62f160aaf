/**
 * Search Module Types
 *
 * Contracts between the coordinator and the retrieval provider adapters.
 */

import type { ProviderAttempt } from '../errors/index.js';

/**
 * One hit returned by a retrieval provider.
 */
export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
  /** Provider relevance score (0-1) when the provider reports one */
  score?: number;
}

export interface ProviderSearchOptions {
  maxResults: number;
  signal?: AbortSignal;
}

/**
 * A retrieval provider (web search API, local corpus, ...).
 *
 * Implementations throw ProviderError on failure and may return an empty
 * array; the coordinator treats both as "try the next provider".
 */
export interface SearchProvider {
  readonly name: string;
  /** False when the provider cannot be used (e.g. missing API key) */
  readonly isAvailable: boolean;
  search(query: string, options: ProviderSearchOptions): Promise<SearchResult[]>;
}

/**
 * A query answered by one provider.
 */
export interface SearchResponse {
  query: string;
  provider: string;
  results: SearchResult[];
  /** Every provider tried for this query, in order, including the winner */
  attempts: ProviderAttempt[];
}

/**
 * Per-query result of a fan-out. Failed queries carry no results.
 */
export type QueryOutcome =
  | ({ status: 'ok' } & SearchResponse)
  | {
      status: 'failed';
      query: string;
      results: [];
      attempts: ProviderAttempt[];
      error: Error;
    };

export interface FanOutOptions {
  /** Concurrent queries (default: number of queries) */
  maxParallelism?: number;
  signal?: AbortSignal;
}
