/**
 * Search coordinator tests
 */

import { describe, it, expect } from 'vitest';
import { SearchCoordinator } from '../coordinator.js';
import {
  AllProvidersFailedError,
  ProviderError,
} from '../../errors/index.js';
import {
  FakeSearchProvider,
  hangingProvider,
  resultsFor,
  createMockLogger,
} from '../../test-utils/fakes.js';

const ok = (name: string) => new FakeSearchProvider(name, async (q) => resultsFor(q));
const failing = (name: string, message = 'HTTP 500') =>
  new FakeSearchProvider(name, async () => {
    throw new ProviderError(name, message, { status: 500 });
  });
const empty = (name: string) => new FakeSearchProvider(name, async () => []);

function coordinator(providers: FakeSearchProvider[], timeoutMs = 1000) {
  return new SearchCoordinator(providers, { timeoutMs, maxResults: 5 });
}

describe('SearchCoordinator.search', () => {
  it('returns the first provider with results', async () => {
    const a = ok('a');
    const b = ok('b');

    const response = await coordinator([a, b]).search('qubits');

    expect(response.provider).toBe('a');
    expect(response.results).toEqual(resultsFor('qubits'));
    expect(b.calls).toEqual([]);
  });

  it('falls back in priority order and records the failed attempt', async () => {
    const logger = createMockLogger();
    const search = new SearchCoordinator([failing('a'), ok('b')], {
      timeoutMs: 1000,
      maxResults: 5,
      logger,
    });

    const response = await search.search('qubits');

    expect(response.provider).toBe('b');
    expect(response.attempts.map(({ provider, ok, reason }) => ({ provider, ok, reason }))).toEqual([
      { provider: 'a', ok: false, reason: 'HTTP 500' },
      { provider: 'b', ok: true, reason: undefined },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('search: a failed for "qubits": HTTP 500');
  });

  it('treats an empty response as a failure', async () => {
    const response = await coordinator([empty('a'), ok('b')]).search('q');

    expect(response.provider).toBe('b');
    expect(response.attempts[0]?.reason).toBe('empty response');
  });

  it('drops results without a URL', async () => {
    const malformed = new FakeSearchProvider('a', async () => [{ url: '', title: 't', snippet: 's' }]);

    const response = await coordinator([malformed, ok('b')]).search('q');

    expect(response.provider).toBe('b');
    expect(response.attempts[0]?.reason).toBe('empty response');
  });

  it('skips unavailable providers', async () => {
    const missingKey = new FakeSearchProvider('a', async (q) => resultsFor(q), false);

    const response = await coordinator([missingKey, ok('b')]).search('q');

    expect(missingKey.calls).toEqual([]);
    expect(response.attempts[0]).toEqual({
      provider: 'a',
      ok: false,
      reason: 'not configured',
      durationMs: 0,
    });
  });

  it('counts a timeout as a failure and moves on', async () => {
    const slow = hangingProvider('slow');

    const response = await coordinator([slow, ok('b')], 20).search('q');

    expect(response.provider).toBe('b');
    expect(response.attempts[0]?.reason).toBe('timed out after 20ms');
  });

  it('throws AllProvidersFailedError with attempts in order', async () => {
    const error = await coordinator([failing('a', 'HTTP 502'), empty('b')])
      .search('q')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllProvidersFailedError);
    if (error instanceof AllProvidersFailedError) {
      expect(error.attempts.map((a) => [a.provider, a.reason])).toEqual([
        ['a', 'HTTP 502'],
        ['b', 'empty response'],
      ]);
    }
  });

  it('stops when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const a = ok('a');

    await expect(coordinator([a]).search('q', controller.signal)).rejects.toThrow('search: cancelled');
    expect(a.calls).toEqual([]);
  });
});

describe('SearchCoordinator circuit breaker', () => {
  it('skips a provider after repeated failures and retries after the cooldown', async () => {
    let now = 0;
    const a = failing('a');
    const search = new SearchCoordinator([a, ok('b')], {
      timeoutMs: 1000,
      maxResults: 5,
      circuitBreaker: { failureThreshold: 2, windowMs: 10_000, cooldownMs: 5_000, now: () => now },
    });

    await search.search('one');
    await search.search('two');
    const skipped = await search.search('three');

    expect(a.calls).toEqual(['one', 'two']);
    expect(skipped.attempts[0]).toEqual({
      provider: 'a',
      ok: false,
      reason: 'circuit open',
      durationMs: 0,
    });

    now = 5_000;
    await search.search('four');
    expect(a.calls).toEqual(['one', 'two', 'four']);
  });
});

describe('SearchCoordinator.fanOut', () => {
  it('returns per-query outcomes in input order and tolerates failures', async () => {
    const provider = new FakeSearchProvider('a', async (q) => {
      if (q.startsWith('bad')) {
        throw new ProviderError('a', 'HTTP 500');
      }
      return resultsFor(q);
    });
    const queries = ['q1', 'bad1', 'q2', 'bad2', 'q3'];

    const outcomes = await coordinator([provider]).fanOut(queries);

    expect(outcomes.map((o) => o.query)).toEqual(queries);
    expect(outcomes.map((o) => o.status)).toEqual(['ok', 'failed', 'ok', 'failed', 'ok']);
    expect(outcomes.filter((o) => o.results.length > 0)).toHaveLength(3);
    expect(outcomes.filter((o) => o.results.length === 0)).toHaveLength(2);

    const failed = outcomes[1];
    expect(failed?.status === 'failed' && failed.error).toBeInstanceOf(AllProvidersFailedError);
  });

  it('bounds concurrency', async () => {
    let active = 0;
    let peak = 0;
    const provider = new FakeSearchProvider('a', async (q) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return resultsFor(q);
    });

    await coordinator([provider]).fanOut(['a', 'b', 'c', 'd', 'e'], { maxParallelism: 2 });

    expect(peak).toBe(2);
    expect(provider.calls).toHaveLength(5);
  });

  it('applies the configured parallelism cap', async () => {
    let active = 0;
    let peak = 0;
    const provider = new FakeSearchProvider('a', async (q) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return resultsFor(q);
    });
    const search = new SearchCoordinator([provider], { timeoutMs: 1000, maxResults: 5, maxParallel: 1 });

    await search.fanOut(['a', 'b', 'c']);

    expect(peak).toBe(1);
  });

  it('marks every query failed once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcomes = await coordinator([ok('a')]).fanOut(['x', 'y'], { signal: controller.signal });

    expect(outcomes.map((o) => o.status)).toEqual(['failed', 'failed']);
  });

  it('returns nothing for no queries', async () => {
    await expect(coordinator([ok('a')]).fanOut([])).resolves.toEqual([]);
  });
});
