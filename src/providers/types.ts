/**
 * Provider contracts
 *
 * The pipeline reaches external models only through these two narrow
 * interfaces. Implementations turn their own failures into ProviderError
 * or TimeoutError and never retry on their own.
 */

export interface ProviderRequestOptions {
  /** Aborted when the caller's deadline passes */
  signal?: AbortSignal;
}

export interface EmbeddingResponse {
  /** One vector per input text, in input order */
  vectors: number[][];
  /** Token usage as reported by the provider, when it reports one */
  usage?: { promptTokens: number };
}

export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: string[], model: string, options?: ProviderRequestOptions): Promise<EmbeddingResponse>;
}

export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationResponse {
  text: string;
  /** Model that actually answered (providers may resolve aliases) */
  model: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface GenerationProvider {
  readonly name: string;
  generate(request: GenerationRequest, options?: ProviderRequestOptions): Promise<GenerationResponse>;
}
