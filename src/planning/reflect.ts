/**
 * Reflection
 *
 * Judges whether the compressed evidence answers the question and proposes
 * follow-up queries. Malformed output counts as sufficient: finalizing early
 * beats looping on empty reflections.
 */

import { z } from 'zod';
import { SchemaValidationError } from '../errors/index.js';
import { generateStructured } from '../providers/structured.js';
import type { LLMClient } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { currentDate, reflectionPrompt } from './prompts.js';
import { normalizeQueries } from './queries.js';
import type { ReflectionResult } from './types.js';

export const ReflectionSchema = z.object({
  isSufficient: z.boolean(),
  knowledgeGap: z.string().default(''),
  followUpQueries: z.array(z.string()).default([]),
});

export interface ReflectOptions {
  /** Cap on follow-up queries */
  maxFollowUps?: number;
  logger?: Logger;
  signal?: AbortSignal;
  date?: string;
}

export async function reflect(
  llm: LLMClient,
  compressedEvidence: string,
  question: string,
  loopCount: number,
  options: ReflectOptions = {}
): Promise<ReflectionResult> {
  const logger = options.logger ?? silentLogger;

  try {
    const result = await generateStructured(
      llm,
      reflectionPrompt(question, compressedEvidence, loopCount, options.date ?? currentDate()),
      ReflectionSchema,
      { signal: options.signal }
    );
    return {
      isSufficient: result.isSufficient,
      knowledgeGap: result.knowledgeGap,
      followUpQueries: result.isSufficient
        ? []
        : normalizeQueries(result.followUpQueries, options.maxFollowUps ?? Number.POSITIVE_INFINITY),
    };
  } catch (error) {
    if (!(error instanceof SchemaValidationError)) {
      throw error;
    }
    logger.warn(`reflection: ${error.message}; treating evidence as sufficient`);
    return { isSufficient: true, knowledgeGap: '', followUpQueries: [] };
  }
}
