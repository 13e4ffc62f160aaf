/**
 * Tavily search adapter
 */

import { z } from 'zod';
import { ProviderError } from '../../errors/index.js';
import type { ProviderSearchOptions, SearchProvider, SearchResult } from '../types.js';
import { fetchJson } from './http.js';

const TAVILY_ENDPOINT = 'https://api.tavily.com/search';

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      url: z.string(),
      title: z.string().default(''),
      content: z.string().default(''),
      score: z.number().optional(),
    })
  ),
});

export class TavilyProvider implements SearchProvider {
  readonly name = 'tavily';

  constructor(private readonly apiKey: string | undefined) {}

  get isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async search(query: string, options: ProviderSearchOptions): Promise<SearchResult[]> {
    if (!this.apiKey) {
      throw new ProviderError(this.name, 'not configured');
    }

    const body = await fetchJson(
      this.name,
      TAVILY_ENDPOINT,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: options.maxResults,
          search_depth: 'advanced',
        }),
        signal: options.signal,
      },
      TavilyResponseSchema
    );

    return body.results
      .filter((item) => item.url.length > 0)
      .map((item) => ({
        url: item.url,
        title: item.title,
        snippet: item.content,
        score: item.score,
      }));
  }
}
