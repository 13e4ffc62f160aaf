/**
 * Evidence validation
 *
 * Heuristic pass: evidence must carry a source (when citations are
 * required) and mention a keyword of its query, exactly or within the fuzzy
 * cutoff. Hybrid mode then asks the LLM to confirm each survivor; a failed
 * check call keeps the evidence.
 */

import pLimit from 'p-limit';
import type { LLMClient } from '../providers/types.js';
import { closestMatch } from '../utils/fuzzy.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { EvidenceUnit } from './types.js';

export type ValidationMode = 'heuristic' | 'hybrid';

export interface ValidateOptions {
  mode: ValidationMode;
  requireCitations: boolean;
  /** Similarity needed for a fuzzy keyword match */
  fuzzyCutoff: number;
  /** Required in hybrid mode */
  llm?: LLMClient;
  /** Concurrent claim-check calls */
  concurrency?: number;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface ValidationResult {
  validated: EvidenceUnit[];
  notes: string[];
}

const MIN_KEYWORD_LENGTH = 4;
const SNIPPET_CHECK_CHARS = 500;

export function keywordsOf(query: string): string[] {
  const tokens = query.toLowerCase().split(/[^\p{L}\p{N}]+/u);
  return [...new Set(tokens.filter((token) => token.length >= MIN_KEYWORD_LENGTH))];
}

function matchesQuery(unit: EvidenceUnit, fuzzyCutoff: number): boolean {
  const keywords = keywordsOf(unit.query);
  if (keywords.length === 0) {
    return true;
  }
  const text = `${unit.title} ${unit.snippet}`.toLowerCase();
  if (keywords.some((keyword) => text.includes(keyword))) {
    return true;
  }
  const words = new Set(text.split(/\s+/).filter(Boolean));
  return keywords.some((keyword) => closestMatch(keyword, words, fuzzyCutoff) !== null);
}

export function claimCheckPrompt(unit: EvidenceUnit): string {
  return [
    `Does the following snippet contain information relevant to the query "${unit.query}"?`,
    `Snippet: "${unit.snippet.slice(0, SNIPPET_CHECK_CHARS)}"`,
    'Reply with YES or NO only.',
  ].join('\n');
}

export async function validateEvidence(
  units: EvidenceUnit[],
  options: ValidateOptions
): Promise<ValidationResult> {
  const logger = options.logger ?? silentLogger;
  const notes: string[] = [];

  if (units.length === 0) {
    return { validated: [], notes: ['No evidence to validate.'] };
  }

  const passed: EvidenceUnit[] = [];
  for (const unit of units) {
    if (options.requireCitations && (!unit.sourceUrl || unit.citationIndex < 1)) {
      notes.push(`[${unit.citationIndex}] rejected: missing citation`);
      continue;
    }
    if (!matchesQuery(unit, options.fuzzyCutoff)) {
      notes.push(`[${unit.citationIndex}] filtered: low overlap with "${unit.query}"`);
      continue;
    }
    passed.push(unit);
  }

  let validated = passed;
  if (options.mode === 'hybrid' && options.llm && passed.length > 0) {
    const llm = options.llm;
    const limit = pLimit(options.concurrency ?? 5);
    const verdicts = await Promise.all(
      passed.map((unit) =>
        limit(async () => {
          try {
            const reply = await llm.generate(claimCheckPrompt(unit), {
              temperature: 0,
              maxTokens: 5,
              signal: options.signal,
            });
            return reply.toUpperCase().includes('YES');
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`validation: claim check failed for [${unit.citationIndex}], keeping it: ${message}`);
            return true;
          }
        })
      )
    );
    validated = passed.filter((unit, i) => {
      if (verdicts[i]) {
        return true;
      }
      notes.push(`[${unit.citationIndex}] rejected by claim check`);
      return false;
    });
  }

  if (validated.length === 0) {
    notes.push('All evidence failed validation.');
  }
  return { validated, notes };
}
