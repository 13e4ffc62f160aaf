/**
 * JSON utilities
 *
 * Parsing for JSON read back from the database or returned by models, where
 * corruption is possible and callers want a fallback instead of a throw.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it with a zod schema, returning the
 * fallback when the text is missing, not JSON, or the wrong shape.
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, MetadataSchema, {});
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  fallback: z.output<S>,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> {
  if (json === null || json === undefined) {
    return fallback;
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}

/**
 * Extract the first JSON object embedded in free text (models often wrap
 * JSON in prose or code fences). Returns null when none is found.
 */
export function extractJsonObject(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = fenced?.[1] ?? text;
  const match = candidate.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
}
