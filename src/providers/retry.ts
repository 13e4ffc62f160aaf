/**
 * Retry with exponential backoff
 *
 * Delay for attempt n (0-based) is `baseDelayMs * 2^n`, capped at
 * `maxDelayMs`, plus up to `jitterMs` of random jitter. Only retryable
 * ProviderErrors are retried.
 */

import { ProviderError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { Embedder, GenerateOptions, LLMClient } from './types.js';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  logger?: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitterMs' | 'random'> = {}
): number {
  const { baseDelayMs = 500, maxDelayMs = 8000, jitterMs = 200, random = Math.random } = options;
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs) + Math.floor(random() * jitterMs);
}

function isRetryable(error: unknown): error is ProviderError {
  return error instanceof ProviderError && error.retryable;
}

/**
 * Run `fn`, retrying retryable provider errors. Aborts stop retries.
 */
export async function retryWithBackoff<T>(
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions,
  signal?: AbortSignal
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt >= options.maxRetries || signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt, options);
      options.logger?.debug?.(
        `${label}: ${error.message}; retry ${attempt + 1}/${options.maxRetries} in ${delay}ms`
      );
      await sleep(delay);
    }
  }
}

/**
 * Wrap an LLM client so every call is retried. Components receiving the
 * wrapped client treat it as already retried.
 */
export function withRetry(llm: LLMClient, options: RetryOptions): LLMClient {
  return {
    name: llm.name,
    model: llm.model,
    generate: (prompt: string, generateOptions?: GenerateOptions) =>
      retryWithBackoff(
        `${llm.name}/${llm.model}`,
        () => llm.generate(prompt, generateOptions),
        options,
        generateOptions?.signal
      ),
  };
}

/**
 * Same wrapper for embedders.
 */
export function withEmbedRetry(embedder: Embedder, options: RetryOptions): Embedder {
  return {
    name: embedder.name,
    dimensions: embedder.dimensions,
    embed: (texts: string[], signal?: AbortSignal) =>
      retryWithBackoff(embedder.name, () => embedder.embed(texts, signal), options, signal),
  };
}
