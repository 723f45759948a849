/**
 * OpenAI Providers
 *
 * Embedding and chat-completion providers on the official openai SDK.
 *
 * The SDK's own retries are turned off (maxRetries: 0): a failed call
 * fails the request, and retrying is the caller's decision.
 *
 * SECURITY: the API key is read from the environment only when a client
 * is built, and never appears in errors or logs.
 */

import OpenAI from 'openai';
import { getEnv } from '../config/env.js';
import { APIKeyError, CLIError, ProviderError, TimeoutError } from '../errors/index.js';
import type {
  EmbeddingProvider,
  EmbeddingResponse,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
  ProviderRequestOptions,
} from './types.js';

// ============================================================================
// SDK SURFACE
// ============================================================================

/**
 * The slice of `client.embeddings` the embedding provider calls.
 */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[] },
    options?: { signal?: AbortSignal }
  ): Promise<{
    data: Array<{ embedding: number[]; index: number }>;
    usage?: { prompt_tokens: number };
  }>;
}

type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/**
 * The slice of `client.chat.completions` the generation provider calls.
 */
export interface ChatCompletionsApi {
  create(
    body: { model: string; messages: ChatMessage[]; temperature?: number; max_tokens?: number },
    options?: { signal?: AbortSignal }
  ): Promise<{
    model: string;
    choices: Array<{ message: { content: string | null } }>;
    usage?: { prompt_tokens: number; completion_tokens: number };
  }>;
}

export interface OpenAIClientOptions {
  /** Explicit key; defaults to OPENAI_API_KEY */
  apiKey?: string;
  /** Custom base URL (proxies, OpenAI-compatible servers) */
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Build an SDK client.
 *
 * @throws APIKeyError when no key is configured
 */
export function createOpenAIClient(options: OpenAIClientOptions = {}): OpenAI {
  const apiKey = options.apiKey ?? getEnv('OPENAI_API_KEY');
  if (!apiKey) {
    throw new APIKeyError('OpenAI');
  }

  return new OpenAI({
    apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

/**
 * Map an SDK failure onto the docqa taxonomy.
 *
 * SDK timeouts and aborts (our deadline firing) become TimeoutError;
 * HTTP and connection failures become ProviderError with the status.
 */
export function toProviderError(error: unknown, operation: string, timeoutMs = 0): CLIError {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
    return new TimeoutError(operation, timeoutMs);
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderError(`${operation} failed: ${error.message}`, {
      cause: error,
      status: error.status,
    });
  }
  if (error instanceof Error) {
    return new ProviderError(`${operation} failed: ${error.message}`, { cause: error });
  }
  return new ProviderError(`${operation} failed: ${String(error)}`);
}

// ============================================================================
// PROVIDERS
// ============================================================================

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';

  constructor(
    private readonly api: EmbeddingsApi,
    private readonly timeoutMs = 0
  ) {}

  async embed(
    texts: string[],
    model: string,
    options: ProviderRequestOptions = {}
  ): Promise<EmbeddingResponse> {
    let response: Awaited<ReturnType<EmbeddingsApi['create']>>;
    try {
      response = await this.api.create({ model, input: texts }, { signal: options.signal });
    } catch (error) {
      throw toProviderError(error, 'Embedding request', this.timeoutMs);
    }

    // The API reports each vector's input index; don't rely on array order
    const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);

    return {
      vectors,
      usage: response.usage ? { promptTokens: response.usage.prompt_tokens } : undefined,
    };
  }
}

export class OpenAIGenerationProvider implements GenerationProvider {
  readonly name = 'openai';

  constructor(
    private readonly api: ChatCompletionsApi,
    private readonly timeoutMs = 0
  ) {}

  async generate(
    request: GenerationRequest,
    options: ProviderRequestOptions = {}
  ): Promise<GenerationResponse> {
    let completion: Awaited<ReturnType<ChatCompletionsApi['create']>>;
    try {
      completion = await this.api.create(
        {
          model: request.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw toProviderError(error, 'Generation request', this.timeoutMs);
    }

    const text = completion.choices[0]?.message.content?.trim();
    if (!text) {
      throw new ProviderError('Generation request returned an empty answer');
    }

    return {
      text,
      model: completion.model,
      usage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
          }
        : undefined,
    };
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

export function createOpenAIEmbeddingProvider(options: OpenAIClientOptions = {}): OpenAIEmbeddingProvider {
  return new OpenAIEmbeddingProvider(createOpenAIClient(options).embeddings, options.timeoutMs);
}

export function createOpenAIGenerationProvider(
  options: OpenAIClientOptions = {}
): OpenAIGenerationProvider {
  return new OpenAIGenerationProvider(createOpenAIClient(options).chat.completions, options.timeoutMs);
}
