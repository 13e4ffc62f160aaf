/**
 * Error type definitions for Delve
 *
 * Every error the engine raises extends CLIError, so the CLI can format any
 * of them the same way:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all Delve errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside their allowed range
 * - Unknown config keys
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: delve config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown for database-related errors.
 *
 * Wraps SQLite errors with user-friendly messages.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: delve status  to check database health', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when user input fails validation.
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Provider errors
// ============================================================================

/**
 * A call to an external capability (LLM, embedder, search API) failed.
 *
 * Recoverable: the coordinator falls back to the next provider and the LLM
 * wrapper retries with backoff when `retryable` is set.
 *
 * Exit code 7: Provider error
 */
export class ProviderError extends CLIError {
  /** Provider that failed (e.g. "brave", "openai") */
  public readonly provider: string;

  /** Whether retrying the same call may succeed */
  public readonly retryable: boolean;

  /** HTTP status, when the failure came from an HTTP response */
  public readonly status?: number;

  public readonly cause?: Error;

  constructor(
    provider: string,
    message: string,
    options: { retryable?: boolean; status?: number; cause?: Error } = {}
  ) {
    super(
      `${provider}: ${message}`,
      'Check the provider API key and network, or change search.provider_priority',
      7
    );
    this.name = 'ProviderError';
    this.provider = provider;
    this.retryable = options.retryable ?? false;
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * The provider rejected the call because of a rate limit or exhausted quota.
 */
export class ProviderQuotaExceededError extends ProviderError {
  constructor(provider: string, cause?: Error) {
    super(provider, 'quota exceeded or rate limited', {
      retryable: true,
      status: 429,
      cause,
    });
    this.name = 'ProviderQuotaExceededError';
  }
}

/**
 * The provider did not answer within its timeout.
 */
export class ProviderTimeoutError extends ProviderError {
  public readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number, cause?: Error) {
    super(provider, `timed out after ${timeoutMs}ms`, { retryable: true, cause });
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Structured LLM output did not match the expected shape.
 *
 * Callers recover with a documented safe default (e.g. reflection treats it
 * as "sufficient").
 *
 * Exit code 8
 */
export class SchemaValidationError extends CLIError {
  /** Zod issues, formatted as "path: message" */
  public readonly issues: string[];

  /** The raw text that failed to parse (truncated) */
  public readonly raw: string;

  constructor(message: string, issues: string[] = [], raw: string = '') {
    super(message, 'The model returned malformed structured output', 8);
    this.name = 'SchemaValidationError';
    this.issues = issues;
    this.raw = raw.slice(0, 500);
  }
}

/**
 * One provider's outcome while serving a query.
 */
export interface ProviderAttempt {
  provider: string;
  ok: boolean;
  /** Failure reason (absent on success) */
  reason?: string;
  durationMs: number;
}

/**
 * Every configured provider failed for a query.
 *
 * Carries the per-provider failure reasons in the order they were tried.
 *
 * Exit code 9
 */
export class AllProvidersFailedError extends CLIError {
  public readonly query: string;
  public readonly attempts: ProviderAttempt[];

  constructor(query: string, attempts: ProviderAttempt[]) {
    const summary =
      attempts.length > 0
        ? attempts.map((a) => `${a.provider} (${a.reason ?? 'unknown'})`).join(', ')
        : 'no providers configured';
    super(
      `All search providers failed for "${query}": ${summary}`,
      'Check provider API keys with: delve status',
      9
    );
    this.name = 'AllProvidersFailedError';
    this.query = query;
    this.attempts = attempts;
  }
}

// ============================================================================
// Evidence index errors
// ============================================================================

export type IndexBackendName = 'memory' | 'sqlite';

/**
 * A chunk could not be written to one of the index backends.
 *
 * Reported inside ingestion results rather than thrown through the engine.
 *
 * Exit code 10
 */
export class IndexWriteError extends CLIError {
  public readonly chunkId: string;
  public readonly backend: IndexBackendName;
  public readonly cause?: Error;

  constructor(chunkId: string, backend: IndexBackendName, cause?: Error) {
    super(
      `Failed to write chunk ${chunkId} to ${backend} backend${cause ? `: ${cause.message}` : ''}`,
      'Run: delve evidence rebuild  to resynchronise the index',
      10
    );
    this.name = 'IndexWriteError';
    this.chunkId = chunkId;
    this.backend = backend;
    this.cause = cause;
  }
}

// ============================================================================
// Engine errors
// ============================================================================

/**
 * A pipeline stage failed. The session ends as Failed with this reason.
 *
 * Exit code 11
 */
export class StageError extends CLIError {
  public readonly stage: string;
  public readonly cause?: Error;

  constructor(stage: string, message: string, cause?: Error) {
    super(`Stage ${stage} failed: ${message}`, 'Run with --verbose for details', 11);
    this.name = 'StageError';
    this.stage = stage;
    this.cause = cause;
  }
}

/**
 * Configuration or programmer error detected while running a stage.
 * Never retried; surfaced verbatim.
 *
 * Exit code 12
 */
export class StageFatalError extends CLIError {
  public readonly stage: string;

  constructor(stage: string, message: string) {
    super(message, `Raised by stage ${stage}`, 12);
    this.name = 'StageFatalError';
    this.stage = stage;
  }
}

/**
 * No session with the given id exists in memory or in the session store.
 *
 * Exit code 13
 */
export class SessionNotFoundError extends CLIError {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'Run: delve sessions  to list sessions', 13);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/**
 * The session is not in a state that accepts the requested operation.
 *
 * Exit code 13
 */
export class SessionStateError extends CLIError {
  public readonly sessionId: string;
  public readonly state: string;

  constructor(sessionId: string, state: string, message: string) {
    super(message, `Session ${sessionId} is in state "${state}"`, 13);
    this.name = 'SessionStateError';
    this.sessionId = sessionId;
    this.state = state;
  }
}
