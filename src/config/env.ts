/**
 * Environment Variable Handler
 *
 * Loads API keys for the LLM and search providers. Supports .env files via
 * dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Every key is optional at load time; a provider checks for its own key
 * when it is constructed.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  /** OpenAI-compatible endpoint (e.g. a local Ollama server at /v1) */
  OPENAI_BASE_URL: z.string().url().optional(),
  TAVILY_API_KEY: z.string().optional(),
  BRAVE_API_KEY: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type KeyedService = 'openai' | 'tavily' | 'brave';

// ============================================================================
// PRIVATE STATE
// ============================================================================

let _envCache: EnvVars | null = null;

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * An invalid OPENAI_BASE_URL is dropped rather than failing every command.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENAI_API_KEY: blankToUndefined(process.env.OPENAI_API_KEY),
    OPENAI_BASE_URL: blankToUndefined(process.env.OPENAI_BASE_URL),
    TAVILY_API_KEY: blankToUndefined(process.env.TAVILY_API_KEY),
    BRAVE_API_KEY: blankToUndefined(process.env.BRAVE_API_KEY),
  };

  const result = EnvSchema.safeParse(raw);
  _envCache = result.success ? result.data : { ...raw, OPENAI_BASE_URL: undefined };
  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured, without exposing it.
 */
export function hasApiKey(service: KeyedService): boolean {
  const env = loadEnv();
  switch (service) {
    case 'openai':
      return Boolean(env.OPENAI_API_KEY);
    case 'tavily':
      return Boolean(env.TAVILY_API_KEY);
    case 'brave':
      return Boolean(env.BRAVE_API_KEY);
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

export const SETUP_INSTRUCTIONS: Record<KeyedService, string> = {
  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. export OPENAI_API_KEY="..."   (or add it to .env)

For a local OpenAI-compatible server (e.g. Ollama), set instead:
   export OPENAI_BASE_URL="http://localhost:11434/v1"
`.trim(),

  tavily: `
To search with Tavily:

1. Get your API key from https://app.tavily.com/
2. export TAVILY_API_KEY="..."   (or add it to .env)
`.trim(),

  brave: `
To search with Brave:

1. Get your API key from https://api.search.brave.com/
2. export BRAVE_API_KEY="..."   (or add it to .env)
`.trim(),
};
