/**
 * Shared HTTP plumbing for provider adapters
 */

import type { z } from 'zod';
import { ProviderError, ProviderQuotaExceededError } from '../../errors/index.js';

/**
 * Fetch a JSON endpoint and validate the body.
 *
 * @throws ProviderError on transport errors, non-2xx statuses and bodies that
 *   do not match the schema (401/403 as authentication failures, 429 as
 *   ProviderQuotaExceededError)
 */
export async function fetchJson<S extends z.ZodTypeAny>(
  provider: string,
  url: string,
  init: RequestInit,
  schema: S
): Promise<z.output<S>> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    const aborted = cause?.name === 'AbortError';
    throw new ProviderError(provider, aborted ? 'request aborted' : `request failed: ${String(error)}`, {
      retryable: !aborted,
      cause,
    });
  }

  if (response.status === 429) {
    throw new ProviderQuotaExceededError(provider);
  }
  if (response.status === 401 || response.status === 403) {
    throw new ProviderError(provider, `authentication failed (HTTP ${response.status})`, {
      status: response.status,
    });
  }
  if (!response.ok) {
    throw new ProviderError(provider, `HTTP ${response.status}`, {
      status: response.status,
      retryable: response.status >= 500,
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ProviderError(provider, 'malformed response: body is not JSON', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    throw new ProviderError(provider, `malformed response: ${where}`);
  }
  return parsed.data;
}
