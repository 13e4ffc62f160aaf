/**
 * Brave Search adapter
 */

import { z } from 'zod';
import { ProviderError } from '../../errors/index.js';
import type { ProviderSearchOptions, SearchProvider, SearchResult } from '../types.js';
import { fetchJson } from './http.js';

const BRAVE_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z.array(
        z.object({
          url: z.string(),
          title: z.string().default(''),
          description: z.string().default(''),
        })
      ),
    })
    .optional(),
});

/** Brave marks matched terms with <strong> tags */
function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, '');
}

export class BraveProvider implements SearchProvider {
  readonly name = 'brave';

  constructor(private readonly apiKey: string | undefined) {}

  get isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async search(query: string, options: ProviderSearchOptions): Promise<SearchResult[]> {
    if (!this.apiKey) {
      throw new ProviderError(this.name, 'not configured');
    }

    const params = new URLSearchParams({
      q: query,
      count: String(options.maxResults),
      safesearch: 'strict',
    });
    const body = await fetchJson(
      this.name,
      `${BRAVE_ENDPOINT}?${params.toString()}`,
      {
        headers: {
          Accept: 'application/json',
          'X-Subscription-Token': this.apiKey,
        },
        signal: options.signal,
      },
      BraveResponseSchema
    );

    return (body.web?.results ?? [])
      .filter((item) => item.url.length > 0)
      .map((item) => ({
        url: item.url,
        title: stripTags(item.title),
        snippet: stripTags(item.description),
      }));
  }
}
