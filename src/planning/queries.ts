/**
 * Initial query generation
 */

import { z } from 'zod';
import { SchemaValidationError } from '../errors/index.js';
import { generateStructured } from '../providers/structured.js';
import type { LLMClient } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { currentDate, queryPlanPrompt } from './prompts.js';

export const QueryPlanSchema = z.object({
  rationale: z.string().default(''),
  queries: z.array(
    z.union([z.string(), z.object({ query: z.string(), rationale: z.string().optional() })])
  ),
});

export interface QueryGenerationOptions {
  logger?: Logger;
  signal?: AbortSignal;
  /** Injected for tests */
  date?: string;
}

/**
 * Trim, drop blanks and case-insensitive duplicates, cap at `count`.
 */
export function normalizeQueries(queries: string[], count: number): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of queries) {
    const query = raw.trim().replace(/\s+/g, ' ');
    const key = query.toLowerCase();
    if (query.length === 0 || seen.has(key)) continue;
    seen.add(key);
    result.push(query);
    if (result.length === count) break;
  }
  return result;
}

/**
 * Ask the LLM for up to `count` search queries.
 *
 * Malformed output falls back to searching the question itself. Provider
 * errors propagate.
 */
export async function generateQueries(
  llm: LLMClient,
  question: string,
  count: number,
  options: QueryGenerationOptions = {}
): Promise<string[]> {
  const logger = options.logger ?? silentLogger;

  try {
    const plan = await generateStructured(
      llm,
      queryPlanPrompt(question, count, options.date ?? currentDate()),
      QueryPlanSchema,
      { signal: options.signal }
    );
    const queries = normalizeQueries(
      plan.queries.map((item) => (typeof item === 'string' ? item : item.query)),
      count
    );
    if (queries.length > 0) {
      return queries;
    }
    logger.warn('planning: model returned no usable queries, searching the question itself');
  } catch (error) {
    if (!(error instanceof SchemaValidationError)) {
      throw error;
    }
    logger.warn(`planning: ${error.message}, searching the question itself`);
  }

  return normalizeQueries([question], 1);
}
