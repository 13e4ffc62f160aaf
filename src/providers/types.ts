/**
 * LLM and embedding capability types
 *
 * The engine only ever sees these interfaces. Vendor SDKs stay inside the
 * implementations in this directory.
 */

export interface GenerateOptions {
  /** System instruction sent ahead of the prompt */
  system?: string;
  /** Ask the model for a JSON object reply */
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Opaque text generation capability.
 *
 * Failures are ProviderError subclasses: ProviderQuotaExceededError,
 * ProviderTimeoutError, or ProviderError itself.
 */
export interface LLMClient {
  /** Provider name for logs (e.g. "openai") */
  readonly name: string;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * Text embedding capability. Vectors are unit-normalized by the index, not
 * by the embedder.
 */
export interface Embedder {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;
}
