/**
 * DuckDuckGo Instant Answer adapter
 *
 * Keyless. Coverage is limited to topics with an instant answer, so it sits
 * last in the default priority order.
 */

import { z } from 'zod';
import type { ProviderSearchOptions, SearchProvider, SearchResult } from '../types.js';
import { fetchJson } from './http.js';

const DDG_ENDPOINT = 'https://api.duckduckgo.com/';

interface Topic {
  Text?: string;
  FirstURL?: string;
  Topics?: Topic[];
}

const TopicSchema: z.ZodType<Topic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(TopicSchema).optional(),
  })
);

const DuckDuckGoResponseSchema = z.object({
  Heading: z.string().default(''),
  AbstractText: z.string().default(''),
  AbstractURL: z.string().default(''),
  RelatedTopics: z.array(TopicSchema).default([]),
});

function flattenTopics(topics: Topic[]): Topic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

export class DuckDuckGoProvider implements SearchProvider {
  readonly name = 'duckduckgo';
  readonly isAvailable = true;

  async search(query: string, options: ProviderSearchOptions): Promise<SearchResult[]> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      no_html: '1',
      skip_disambig: '1',
    });
    const body = await fetchJson(
      this.name,
      `${DDG_ENDPOINT}?${params.toString()}`,
      { headers: { Accept: 'application/json' }, signal: options.signal },
      DuckDuckGoResponseSchema
    );

    const results: SearchResult[] = [];
    if (body.AbstractURL && body.AbstractText) {
      results.push({
        url: body.AbstractURL,
        title: body.Heading || query,
        snippet: body.AbstractText,
      });
    }
    for (const topic of flattenTopics(body.RelatedTopics)) {
      if (topic.FirstURL && topic.Text) {
        // Topic text starts with the page title, separated by " - "
        const [title = topic.Text] = topic.Text.split(' - ');
        results.push({ url: topic.FirstURL, title, snippet: topic.Text });
      }
    }
    return results.slice(0, options.maxResults);
  }
}
