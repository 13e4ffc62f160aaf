/**
 * Citation registry
 *
 * Maps canonical source URLs to stable 1-based citation ids. Ids are handed
 * out in first-seen order and never change or disappear within a session.
 */

import type { QueryOutcome } from '../search/types.js';
import type { EvidenceUnit, SourceRef } from './types.js';

const TRACKING_PARAM = /^(utm_|fbclid$|gclid$)/;

/**
 * Canonical form used for de-duplication: lowercase host, no fragment,
 * no tracking parameters, no trailing slash.
 */
export function canonicalUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim();
  }

  parsed.hash = '';
  for (const key of [...parsed.searchParams.keys()]) {
    if (TRACKING_PARAM.test(key)) {
      parsed.searchParams.delete(key);
    }
  }
  const path = parsed.pathname.length > 1 ? parsed.pathname.replace(/\/+$/, '') : '';
  const query = parsed.searchParams.toString();
  return `${parsed.protocol}//${parsed.host.toLowerCase()}${path}${query ? `?${query}` : ''}`;
}

export class CitationRegistry {
  private sources: Map<string, SourceRef>;

  constructor(entries: Iterable<[string, SourceRef]> = []) {
    this.sources = new Map(entries);
  }

  get size(): number {
    return this.sources.size;
  }

  /**
   * Citation id for a URL, assigning the next id on first sight.
   */
  register(url: string, title: string): number {
    const key = canonicalUrl(url);
    const existing = this.sources.get(key);
    if (existing) {
      return existing.id;
    }
    const ref: SourceRef = { id: this.sources.size + 1, url: key, title: title || key };
    this.sources.set(key, ref);
    return ref.id;
  }

  get(url: string): SourceRef | undefined {
    return this.sources.get(canonicalUrl(url));
  }

  /** Sources ordered by citation id */
  list(): SourceRef[] {
    return [...this.sources.values()].sort((a, b) => a.id - b.id);
  }

  entries(): Array<[string, SourceRef]> {
    return [...this.sources.entries()];
  }

  /**
   * Turn a completed fan-out batch into evidence units. Ids are assigned in
   * outcome order (the batch's query order), then result order, so numbering
   * does not depend on which provider answered first.
   */
  assignBatch(outcomes: QueryOutcome[]): EvidenceUnit[] {
    const units: EvidenceUnit[] = [];
    for (const outcome of outcomes) {
      for (const result of outcome.results) {
        units.push({
          sourceUrl: canonicalUrl(result.url),
          title: result.title,
          snippet: result.snippet,
          score: result.score ?? 0,
          citationIndex: this.register(result.url, result.title),
          query: outcome.query,
        });
      }
    }
    return units;
  }
}
