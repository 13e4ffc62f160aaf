/**
 * Structured output
 *
 * Models are asked for JSON, but replies still arrive wrapped in prose or
 * code fences, or with missing fields. Everything is validated here so
 * callers get typed data or a SchemaValidationError.
 */

import type { z } from 'zod';
import { SchemaValidationError } from '../errors/index.js';
import { extractJsonObject } from '../utils/json.js';
import type { GenerateOptions, LLMClient } from './types.js';

/**
 * Parse a model reply against a schema.
 *
 * @throws SchemaValidationError when no JSON object is found or it does not
 *   match the schema
 */
export function parseStructured<S extends z.ZodTypeAny>(raw: string, schema: S): z.output<S> {
  const jsonText = extractJsonObject(raw);
  if (jsonText === null) {
    throw new SchemaValidationError('No JSON object in model output', [], raw);
  }

  let value: unknown;
  try {
    value = JSON.parse(jsonText);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaValidationError(`Model output is not valid JSON: ${message}`, [], raw);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SchemaValidationError(
      'Model output does not match the expected schema',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      raw
    );
  }
  return result.data;
}

/**
 * Generate and validate structured output in one call.
 *
 * Provider failures propagate unchanged; only shape problems become
 * SchemaValidationError.
 */
export async function generateStructured<S extends z.ZodTypeAny>(
  llm: LLMClient,
  prompt: string,
  schema: S,
  options: GenerateOptions = {}
): Promise<z.output<S>> {
  const raw = await llm.generate(prompt, { ...options, json: true });
  return parseStructured(raw, schema);
}
