/**
 * Embedding Client
 *
 * The only way the pipeline turns text into vectors. Every call:
 * - makes exactly one provider request (a batch goes out whole)
 * - runs under the configured deadline (TimeoutError when it passes)
 * - returns one vector per input, in input order, or fails as a whole
 * - records a UsageRecord once the call has succeeded
 *
 * Usage recording never fails the call. A broken sink is reported through
 * the logger and the vectors are returned as usual.
 */

import type { EmbeddingConfig } from '../../config/schema.js';
import { CLIError, ProviderError, ValidationError } from '../../errors/index.js';
import type { EmbeddingProvider } from '../../providers/types.js';
import type { Tokenizer } from '../../tokenizer/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import type { PriceTable, UsageOperation, UsageRecord, UsageSink } from './types.js';
import { computeCost } from './usage-log.js';

export interface EmbeddingClientOptions {
  provider: EmbeddingProvider;
  /** Measures the tokens each call is billed for */
  tokenizer: Tokenizer;
  model: string;
  /** Expected vector length; unchecked when omitted */
  dimensions?: number;
  timeoutMs: number;
  pricing: PriceTable;
  usageSink?: UsageSink;
  logger?: Logger;
}

export class EmbeddingClient {
  readonly model: string;
  readonly dimensions?: number;

  private readonly provider: EmbeddingProvider;
  private readonly tokenizer: Tokenizer;
  private readonly timeoutMs: number;
  private readonly pricing: PriceTable;
  private readonly usageSink?: UsageSink;
  private readonly logger: Logger;

  constructor(options: EmbeddingClientOptions) {
    this.provider = options.provider;
    this.tokenizer = options.tokenizer;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs;
    this.pricing = options.pricing;
    this.usageSink = options.usageSink;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Embed one text (a search query).
   *
   * @throws ValidationError when the text is empty
   * @throws ProviderError | TimeoutError when the request fails
   */
  async embedOne(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new ValidationError('Cannot embed empty text');
    }
    const [vector] = await this.request('single_text', [text]);
    return vector;
  }

  /**
   * Embed several texts in one request. An empty list makes no request.
   *
   * @throws ValidationError when any text is empty
   * @throws ProviderError | TimeoutError when the request fails
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const issues = texts.flatMap((text, i) =>
      text.trim().length === 0 ? [`texts[${i}] is empty`] : []
    );
    if (issues.length > 0) {
      throw new ValidationError('Cannot embed empty text', issues);
    }

    return this.request('batch_chunks', texts);
  }

  private async request(operation: UsageOperation, texts: string[]): Promise<number[][]> {
    const started = performance.now();

    let vectors: number[][];
    try {
      const response = await withTimeout('Embedding request', this.timeoutMs, (signal) =>
        this.provider.embed(texts, this.model, { signal })
      );
      vectors = response.vectors;
    } catch (error) {
      throw toEmbeddingFailure(error, this.provider.name);
    }

    const elapsedMs = performance.now() - started;
    this.checkVectors(vectors, texts.length);

    const tokens = texts.reduce((sum, text) => sum + this.tokenizer.count(text), 0);
    this.recordUsage({
      operation,
      model: this.model,
      tokens,
      requests: 1,
      elapsedMs,
      cost: computeCost(tokens, this.model, this.pricing),
      timestamp: new Date(),
    });

    return vectors;
  }

  private checkVectors(vectors: number[][], expected: number): void {
    if (vectors.length !== expected) {
      throw new ProviderError(
        `Embedding provider returned ${vectors.length} vectors for ${expected} inputs`
      );
    }
    if (this.dimensions === undefined) return;

    const wrong = vectors.findIndex((vector) => vector.length !== this.dimensions);
    if (wrong !== -1) {
      throw new ProviderError(
        `Embedding ${wrong} has ${vectors[wrong].length} dimensions, expected ${this.dimensions}`,
        { hint: 'Check that embedding.dimensions matches embedding.model in config.toml' }
      );
    }
  }

  private recordUsage(usage: UsageRecord): void {
    if (!this.usageSink) return;
    try {
      this.usageSink.record(usage);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not write embedding usage log: ${message}`);
    }
  }
}

/**
 * Taxonomy errors pass through; anything else a provider throws becomes a
 * ProviderError with the original as cause.
 */
function toEmbeddingFailure(error: unknown, providerName: string): Error {
  if (error instanceof CLIError) {
    return error;
  }
  return new ProviderError(`${providerName} embedding request failed`, {
    cause: error instanceof Error ? error : new Error(String(error)),
  });
}

/**
 * Build a client from the [embedding] config section.
 */
export function createEmbeddingClient(
  config: EmbeddingConfig,
  deps: Pick<EmbeddingClientOptions, 'provider' | 'tokenizer' | 'usageSink' | 'logger'>
): EmbeddingClient {
  return new EmbeddingClient({
    ...deps,
    model: config.model,
    dimensions: config.dimensions,
    timeoutMs: config.timeout_ms,
    pricing: { prices: config.pricing, defaultPricePer1k: config.default_price_per_1k },
  });
}
