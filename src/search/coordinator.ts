/**
 * Search Coordinator
 *
 * Routes each query through the providers in priority order. Every call is
 * bounded by a timeout; the first non-empty result wins. `fanOut` runs one
 * independent search per query on a bounded worker pool.
 */

import pLimit from 'p-limit';
import {
  AllProvidersFailedError,
  ProviderError,
  ProviderTimeoutError,
  type ProviderAttempt,
} from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker.js';
import type {
  FanOutOptions,
  QueryOutcome,
  SearchProvider,
  SearchResponse,
  SearchResult,
} from './types.js';

export interface SearchCoordinatorOptions {
  /** Per-provider call timeout */
  timeoutMs: number;
  /** Results requested per query */
  maxResults: number;
  /** Hard cap on fan-out parallelism */
  maxParallel?: number;
  /** Enables the circuit breaker when set */
  circuitBreaker?: CircuitBreakerOptions;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  if (error instanceof ProviderError) {
    // Drop the "provider: " prefix; attempts already name the provider
    return error.message.startsWith(`${error.provider}: `)
      ? error.message.slice(error.provider.length + 2)
      : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function isWellFormed(result: SearchResult): boolean {
  return typeof result.url === 'string' && result.url.length > 0;
}

export class SearchCoordinator {
  private readonly breaker: CircuitBreaker | null;
  private readonly logger: Logger;

  /**
   * @param providers - Adapters in priority order
   */
  constructor(
    private readonly providers: SearchProvider[],
    private readonly options: SearchCoordinatorOptions
  ) {
    this.breaker = options.circuitBreaker ? new CircuitBreaker(options.circuitBreaker) : null;
    this.logger = options.logger ?? silentLogger;
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  /**
   * Run one provider call with its own abort controller, linked to the
   * caller's signal, and race it against the timeout.
   */
  private async callWithTimeout(
    provider: SearchProvider,
    query: string,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ProviderTimeoutError(provider.name, this.options.timeoutMs));
        controller.abort();
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([
        provider.search(query, { maxResults: this.options.maxResults, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Search one query with fallback.
   *
   * @throws AllProvidersFailedError when no provider returned usable results
   * @throws ProviderError ("cancelled") when the signal aborts first
   */
  async search(query: string, signal?: AbortSignal): Promise<SearchResponse> {
    const attempts: ProviderAttempt[] = [];

    for (const provider of this.providers) {
      if (signal?.aborted) {
        throw new ProviderError('search', 'cancelled');
      }
      if (!provider.isAvailable) {
        attempts.push({ provider: provider.name, ok: false, reason: 'not configured', durationMs: 0 });
        continue;
      }
      if (this.breaker && !this.breaker.canAttempt(provider.name)) {
        attempts.push({ provider: provider.name, ok: false, reason: 'circuit open', durationMs: 0 });
        continue;
      }

      const startedAt = Date.now();
      try {
        const raw = await this.callWithTimeout(provider, query, signal);
        const results = raw.filter(isWellFormed);
        const durationMs = Date.now() - startedAt;

        if (results.length === 0) {
          attempts.push({ provider: provider.name, ok: false, reason: 'empty response', durationMs });
          this.breaker?.recordFailure(provider.name);
          this.logger.debug?.(`search: ${provider.name} returned nothing for "${query}"`);
          continue;
        }

        attempts.push({ provider: provider.name, ok: true, durationMs });
        this.breaker?.recordSuccess(provider.name);
        return { query, provider: provider.name, results, attempts };
      } catch (error) {
        if (signal?.aborted) {
          throw new ProviderError('search', 'cancelled');
        }
        const reason = errorMessage(error);
        attempts.push({ provider: provider.name, ok: false, reason, durationMs: Date.now() - startedAt });
        this.breaker?.recordFailure(provider.name);
        this.logger.warn(`search: ${provider.name} failed for "${query}": ${reason}`);
      }
    }

    throw new AllProvidersFailedError(query, attempts);
  }

  /**
   * Search every query concurrently. Never throws: failed queries come back
   * with `status: 'failed'` and no results. Outcomes keep input order.
   */
  async fanOut(queries: string[], options: FanOutOptions = {}): Promise<QueryOutcome[]> {
    if (queries.length === 0) {
      return [];
    }

    const requested = options.maxParallelism ?? queries.length;
    const cap = this.options.maxParallel ?? requested;
    const limit = pLimit(Math.max(1, Math.min(requested, cap, queries.length)));

    return Promise.all(
      queries.map((query) =>
        limit(async (): Promise<QueryOutcome> => {
          try {
            const response = await this.search(query, options.signal);
            return { status: 'ok', ...response };
          } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            return {
              status: 'failed',
              query,
              results: [],
              attempts: error instanceof AllProvidersFailedError ? error.attempts : [],
              error: failure,
            };
          }
        })
      )
    );
  }
}
