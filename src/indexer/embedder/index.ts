/**
 * Embedder Module
 *
 * ```typescript
 * const client = createEmbeddingClient(config.embedding, {
 *   provider: createOpenAIEmbeddingProvider(config.embedding),
 *   tokenizer: createTokenizer(config.embedding.model),
 *   usageSink: new FileUsageLog(getUsageLogPath()),
 * });
 *
 * const queryVector = await client.embedOne('What is machine learning?');
 * const embedded = await embedChunks(chunks, client, { batchSize: 100 });
 * ```
 */

export { EmbeddingClient, createEmbeddingClient } from './client.js';
export type { EmbeddingClientOptions } from './client.js';

export { embedChunks } from './embedder.js';

export { FileUsageLog, formatUsageLine, computeCost, pricePer1k, USAGE_MARKER } from './usage-log.js';
export { parseUsageLine, summarizeUsage } from './usage-analyzer.js';
export type { ParsedUsage, UsageSummary, UsageTotals } from './usage-analyzer.js';

export type {
  EmbeddedChunk,
  EmbedderOptions,
  PriceTable,
  UsageOperation,
  UsageRecord,
  UsageSink,
} from './types.js';
