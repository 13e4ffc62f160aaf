/**
 * Test doubles for the engine's collaborators
 *
 * Everything runs in process: scripted search providers, an LLM that answers
 * by prompt keyword, and the offline hashing embedder.
 */

import { vi, type Mock } from 'vitest';
import type { GenerateOptions, LLMClient } from '../providers/types.js';
import type { ProviderSearchOptions, SearchProvider, SearchResult } from '../search/types.js';
import type { Logger } from '../utils/logger.js';

export type SearchScript = (query: string, options: ProviderSearchOptions) => Promise<SearchResult[]>;

/**
 * Search provider driven by a script function. Calls are recorded.
 */
export class FakeSearchProvider implements SearchProvider {
  readonly calls: string[] = [];

  constructor(
    readonly name: string,
    private readonly script: SearchScript,
    readonly isAvailable: boolean = true
  ) {}

  async search(query: string, options: ProviderSearchOptions): Promise<SearchResult[]> {
    this.calls.push(query);
    return this.script(query, options);
  }
}

/**
 * Two results per query, URLs derived from the query text.
 */
export function resultsFor(query: string, count = 2): SearchResult[] {
  const slug = query.toLowerCase().replace(/[^a-z0-9]+/g, '-');
  return Array.from({ length: count }, (_, i) => ({
    url: `https://example.com/${slug}/${i + 1}`,
    title: `${query} (${i + 1})`,
    snippet: `${query} explained: background and details, part ${i + 1}.`,
    score: 0.9 - i * 0.1,
  }));
}

/**
 * A provider that never settles unless its signal aborts.
 */
export function hangingProvider(name: string): FakeSearchProvider {
  return new FakeSearchProvider(
    name,
    (_query, options) =>
      new Promise((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      })
  );
}

export type LLMHandler = (prompt: string, options: GenerateOptions) => string | Promise<string>;

/**
 * LLM double. `routes` maps a substring of the prompt to a reply; the first
 * matching route answers. Unmatched prompts get `fallback`.
 */
export function createFakeLLM(
  routes: Array<[string, string | LLMHandler]>,
  fallback = 'OK'
): LLMClient & { generate: Mock<LLMClient['generate']> } {
  const generate = vi.fn<LLMClient['generate']>(async (prompt, options = {}) => {
    for (const [needle, reply] of routes) {
      if (prompt.includes(needle)) {
        return typeof reply === 'string' ? reply : reply(prompt, options);
      }
    }
    return fallback;
  });
  return { name: 'fake', model: 'fake-model', generate };
}

export function createMockLogger(): Logger & {
  warn: Mock<Logger['warn']>;
  info: Mock<NonNullable<Logger['info']>>;
  debug: Mock<NonNullable<Logger['debug']>>;
} {
  return {
    warn: vi.fn<Logger['warn']>(),
    info: vi.fn<NonNullable<Logger['info']>>(),
    debug: vi.fn<NonNullable<Logger['debug']>>(),
  };
}
