/**
 * Providers Module
 *
 * External embedding and generation models behind narrow interfaces.
 *
 * ```typescript
 * import { createOpenAIGenerationProvider } from './providers/index.js';
 * const generator = createOpenAIGenerationProvider({ timeoutMs: 60000 });
 * ```
 */

export type {
  EmbeddingProvider,
  EmbeddingResponse,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
  ProviderRequestOptions,
} from './types.js';

export {
  OpenAIEmbeddingProvider,
  OpenAIGenerationProvider,
  createOpenAIClient,
  createOpenAIEmbeddingProvider,
  createOpenAIGenerationProvider,
  toProviderError,
  type OpenAIClientOptions,
  type EmbeddingsApi,
  type ChatCompletionsApi,
} from './openai.js';
