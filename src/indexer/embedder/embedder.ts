/**
 * Embedder Orchestration
 *
 * Turns ChunkDescriptor[] into EmbeddedChunk[] for SQLite storage:
 * 1. Send chunks to the embedding client in batches (default: 100)
 * 2. Convert number[] vectors to Float32Array for BLOB storage
 * 3. Report progress after each batch
 *
 * A failed batch fails the whole call. Nothing is returned for the
 * batches that did succeed, so a document is never stored half-embedded.
 */

import type { ChunkDescriptor } from '../chunker/types.js';
import type { EmbeddingClient } from './client.js';
import type { EmbeddedChunk, EmbedderOptions } from './types.js';

const DEFAULT_BATCH_SIZE = 100;

/**
 * Embed chunks in batches.
 *
 * @example
 * ```typescript
 * const chunks = chunkDocument(text, tokenizer, options);
 * const embedded = await embedChunks(chunks, client, {
 *   batchSize: config.embedding.batch_size,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * ```
 */
export async function embedChunks(
  chunks: ChunkDescriptor[],
  client: EmbeddingClient,
  options: EmbedderOptions = {}
): Promise<EmbeddedChunk[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, onProgress } = options;
  const embedded: EmbeddedChunk[] = [];

  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);
    const vectors = await client.embedBatch(batch.map((chunk) => chunk.content));

    batch.forEach((chunk, j) => {
      embedded.push({ ...chunk, embedding: Float32Array.from(vectors[j]) });
    });
    onProgress?.(embedded.length, chunks.length);
  }

  return embedded;
}
