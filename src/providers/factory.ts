/**
 * Provider factory
 *
 * Builds the retried LLM client and embedder from config and environment.
 */

import type { Config } from '../config/schema.js';
import { loadEnv, type EnvVars } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { HashingEmbedder } from './hashing-embedder.js';
import { OpenAIChatClient, OpenAIEmbedder } from './openai.js';
import { withEmbedRetry, withRetry } from './retry.js';
import type { Embedder, LLMClient } from './types.js';

export interface ProviderFactoryOptions {
  env?: EnvVars;
  logger?: Logger;
}

/**
 * @throws APIKeyError when neither OPENAI_API_KEY nor OPENAI_BASE_URL is set
 */
export function createLLMClient(config: Config, options: ProviderFactoryOptions = {}): LLMClient {
  const env = options.env ?? loadEnv();
  if (!env.OPENAI_API_KEY && !env.OPENAI_BASE_URL) {
    throw new APIKeyError('OpenAI');
  }

  const client = new OpenAIChatClient({
    apiKey: env.OPENAI_API_KEY,
    baseURL: env.OPENAI_BASE_URL,
    model: config.llm.model,
    timeoutMs: config.llm.timeout_ms,
    temperature: config.llm.temperature,
  });
  return withRetry(client, { maxRetries: config.llm.max_retries, logger: options.logger });
}

/**
 * @throws APIKeyError when the openai embedder is configured without a key
 *   or base URL
 */
export function createEmbedder(config: Config, options: ProviderFactoryOptions = {}): Embedder {
  if (config.llm.embedding_provider === 'hashing') {
    return new HashingEmbedder(config.llm.embedding_dimensions);
  }

  const env = options.env ?? loadEnv();
  if (!env.OPENAI_API_KEY && !env.OPENAI_BASE_URL) {
    throw new APIKeyError('OpenAI');
  }

  const embedder = new OpenAIEmbedder({
    apiKey: env.OPENAI_API_KEY,
    baseURL: env.OPENAI_BASE_URL,
    model: config.llm.embedding_model,
    timeoutMs: config.llm.timeout_ms,
    dimensions: config.llm.embedding_dimensions,
  });
  return withEmbedRetry(embedder, { maxRetries: config.llm.max_retries, logger: options.logger });
}
