/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings, then these schemas coerce and
 * range-check them. Failures surface as ValidationError, which the global
 * error handler prints with every issue.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/** Whole number flag, e.g. "--loops 3" */
const count = (flag: string, max: number) =>
  z
    .string()
    .regex(/^\d+$/, `${flag} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= 1 && val <= max, { message: `${flag} must be between 1 and ${max}` });

/** 0-1 score flag, e.g. "--below 0.3" */
const score = (flag: string) =>
  z
    .string()
    .regex(/^(0(\.\d+)?|1(\.0+)?|\.\d+)$/, `${flag} must be between 0 and 1`)
    .transform((val) => Number(val));

// ============================================================================
// RESEARCH COMMAND SCHEMA
// ============================================================================

export const ResearchArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(3, 'Question must be at least 3 characters')
    .max(1000, 'Question too long (max 1000 chars)'),
});

export const ResearchOptionsSchema = z
  .object({
    loops: count('--loops', 10).optional(),
    queries: count('--queries', 10).optional(),
    confirm: z.boolean().optional(),
    auto: z.boolean().optional(),
  })
  .refine((options) => !(options.confirm && options.auto), {
    message: '--confirm and --auto cannot be used together',
  });

export type ResearchOptionsInput = z.input<typeof ResearchOptionsSchema>;

// ============================================================================
// SESSIONS COMMAND SCHEMA
// ============================================================================

export const SessionsOptionsSchema = z.object({
  limit: count('--limit', 500).default('20'),
});

// ============================================================================
// EVIDENCE COMMAND SCHEMAS
// ============================================================================

export const EvidenceQueryOptionsSchema = z.object({
  topK: count('--top-k', 100).default('5'),
  minScore: score('--min-score').default('0'),
  subgoal: z.string().min(1).optional(),
});

export const EvidencePruneOptionsSchema = z.object({
  ids: z.array(z.string().min(1)),
  subgoal: z.string().min(1).optional(),
  below: score('--below').optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Parse input with a Zod schema.
 *
 * @example
 * ```typescript
 * const { loops } = parseInput(ResearchOptionsSchema, options);
 * ```
 *
 * @throws ValidationError listing every issue
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError('Invalid command input', issues);
}
