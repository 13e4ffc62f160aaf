/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime, so schema drift
 * (failed migrations, manual edits) surfaces as a clear error instead of
 * silently wrong data.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM research_sessions WHERE id = ?').get(id);
 * return row ? validateRow(ResearchSessionRowSchema, row, `research_sessions.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

/**
 * `embedding` arrives as a Buffer (better-sqlite3 BLOB); conversion to
 * Float32Array happens in the store.
 */
export const EvidenceChunkRowSchema = z.object({
  id: z.string(),
  subgoal_id: z.string(),
  content: z.string(),
  embedding: z.instanceof(Buffer),
  source_url: z.string().nullable(),
  title: z.string().nullable(),
  score: z.number(),
  metadata: z.string().nullable(),
  created_at: z.string(),
  pruned_at: z.string().nullable(),
});

export type EvidenceChunkRow = z.infer<typeof EvidenceChunkRowSchema>;

export const ResearchSessionRowSchema = z.object({
  id: z.string(),
  question: z.string(),
  state: z.string(),
  planning_status: z.string().nullable(),
  snapshot: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type ResearchSessionRow = z.infer<typeof ResearchSessionRowSchema>;

/**
 * `SELECT COUNT(*) AS count ...`
 */
export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Row Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error
 */
export class RowValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const summary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    const more =
      formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '';

    super(
      message,
      `Row validation failed:\n${summary}${more}\n\nThe database may have been written by a different version.`,
      5
    );
    this.name = 'RowValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @throws RowValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new RowValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of rows. Throws on the first invalid row unless
 * `continueOnError` is set, in which case invalid rows are reported to
 * `onError` and skipped.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string,
  options?: {
    continueOnError?: boolean;
    onError?: (row: unknown, error: z.ZodError) => void;
  }
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  rows.forEach((row, i) => {
    const result = schema.safeParse(row);
    if (result.success) {
      valid.push(result.data);
    } else if (options?.continueOnError) {
      options.onError?.(row, result.error);
    } else {
      throw new RowValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
  });

  return valid;
}

/**
 * Read a `COUNT(*) AS count` row.
 */
export function countFrom(row: unknown, context: string): number {
  return validateRow(CountRowSchema, row, context).count;
}
