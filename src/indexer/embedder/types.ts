/**
 * Embedder Types
 */

import type { ChunkDescriptor } from '../chunker/types.js';

/**
 * Which client method produced a usage record.
 */
export type UsageOperation = 'single_text' | 'batch_chunks';

/**
 * One embedding call's usage. Written to the usage log, never read back
 * by the pipeline itself.
 */
export interface UsageRecord {
  operation: UsageOperation;
  model: string;
  /** Tokens across all inputs, measured with the local tokenizer */
  tokens: number;
  /** Provider requests made (always 1 per client call) */
  requests: number;
  /** Wall-clock time of the call in milliseconds */
  elapsedMs: number;
  /** USD, from the configured price table */
  cost: number;
  timestamp: Date;
}

/**
 * Receives usage records. Failures are caught by the client and turned
 * into warnings.
 */
export interface UsageSink {
  record(usage: UsageRecord): void;
}

/**
 * USD per 1K tokens by model, with a fallback for unlisted models.
 */
export interface PriceTable {
  prices: Record<string, number>;
  defaultPricePer1k: number;
}

/**
 * A chunk with its embedding, ready for SQLite storage.
 *
 * Float32Array because vectors are stored as 4-byte float BLOBs
 * (1536 dimensions × 4 bytes = 6KB per chunk).
 */
export interface EmbeddedChunk extends ChunkDescriptor {
  embedding: Float32Array;
}

/**
 * Options for embedChunks.
 */
export interface EmbedderOptions {
  /**
   * Chunks per embedding request.
   * @default 100
   */
  batchSize?: number;

  /** Fired after each batch completes */
  onProgress?: (embedded: number, total: number) => void;
}
