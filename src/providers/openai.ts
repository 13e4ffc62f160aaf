/**
 * OpenAI-compatible LLM and embedding clients
 *
 * Works against api.openai.com or any OpenAI-compatible server
 * (OPENAI_BASE_URL, e.g. Ollama's /v1 endpoint). SDK errors are mapped to
 * the ProviderError hierarchy; retries happen in withRetry, so the SDK's own
 * retries are disabled.
 *
 * The API key is never logged or included in error messages.
 */

import OpenAI from 'openai';
import {
  ProviderError,
  ProviderQuotaExceededError,
  ProviderTimeoutError,
} from '../errors/index.js';
import type { Embedder, GenerateOptions, LLMClient } from './types.js';

export interface OpenAIClientOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  temperature?: number;
  /** Inject a preconfigured SDK client (tests) */
  client?: OpenAI;
}

/**
 * Local OpenAI-compatible servers accept any key, but the SDK requires one.
 */
const KEYLESS_PLACEHOLDER = 'no-key';

function createSdkClient(options: OpenAIClientOptions): OpenAI {
  return (
    options.client ??
    new OpenAI({
      apiKey: options.apiKey ?? KEYLESS_PLACEHOLDER,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    })
  );
}

/**
 * Translate an SDK error into the ProviderError hierarchy.
 */
export function mapOpenAIError(error: unknown, provider: string, timeoutMs: number): Error {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderTimeoutError(provider, timeoutMs, error);
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ProviderQuotaExceededError(provider, error);
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new ProviderError(provider, 'request aborted', { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderError(provider, `connection failed: ${error.message}`, {
      retryable: true,
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const retryable = status === undefined || status >= 500;
    const reason =
      status === 401 || status === 403 ? 'authentication failed' : `HTTP ${status ?? '?'}`;
    return new ProviderError(provider, `${reason}: ${error.message}`, {
      retryable,
      status,
      cause: error,
    });
  }
  if (error instanceof Error) {
    return new ProviderError(provider, error.message, { cause: error });
  }
  return new ProviderError(provider, String(error));
}

export class OpenAIChatClient implements LLMClient {
  readonly name = 'openai';
  readonly model: string;
  private client: OpenAI;
  private timeoutMs: number;
  private temperature: number;

  constructor(options: OpenAIClientOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.temperature = options.temperature ?? 0.2;
    this.client = createSdkClient(options);
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    const response = await this.client.chat.completions
      .create(
        {
          model: this.model,
          messages,
          temperature: options.temperature ?? this.temperature,
          max_tokens: options.maxTokens,
          response_format: options.json ? { type: 'json_object' } : undefined,
        },
        { signal: options.signal }
      )
      .catch((error: unknown) => {
        throw mapOpenAIError(error, this.name, this.timeoutMs);
      });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new ProviderError(this.name, 'empty completion', { retryable: true });
    }
    return content;
  }
}

export interface OpenAIEmbedderOptions extends Omit<OpenAIClientOptions, 'temperature'> {
  dimensions: number;
  /** Texts per API request */
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai-embeddings';
  readonly dimensions: number;
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;
  private batchSize: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.dimensions = options.dimensions;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.batchSize = options.batchSize ?? 64;
    this.client = createSdkClient(options);
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings
        .create(
          {
            model: this.model,
            input: batch,
            dimensions: this.dimensions,
            encoding_format: 'float',
          },
          { signal }
        )
        .catch((error: unknown) => {
          throw mapOpenAIError(error, this.name, this.timeoutMs);
        });

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new ProviderError(
          this.name,
          `expected ${batch.length} embeddings, got ${ordered.length}`
        );
      }
      for (const item of ordered) {
        vectors.push(Float32Array.from(item.embedding));
      }
    }

    return vectors;
  }
}
