/**
 * Providers Module
 *
 * LLM and embedding capabilities behind small interfaces.
 */

export type { LLMClient, Embedder, GenerateOptions } from './types.js';
export { parseStructured, generateStructured } from './structured.js';
export {
  withRetry,
  withEmbedRetry,
  retryWithBackoff,
  backoffDelay,
  type RetryOptions,
} from './retry.js';
export {
  OpenAIChatClient,
  OpenAIEmbedder,
  mapOpenAIError,
  type OpenAIClientOptions,
  type OpenAIEmbedderOptions,
} from './openai.js';
export { HashingEmbedder, tokenize } from './hashing-embedder.js';
export { createLLMClient, createEmbedder, type ProviderFactoryOptions } from './factory.js';
