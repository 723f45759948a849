/**
 * Ingestion Pipeline
 *
 * Orchestrates the ingest workflow for one document's text:
 * Chunk → Embed → Store
 *
 * The pipeline doesn't know HOW to display progress; the CLI's spinner
 * does. It just fires callbacks at the right moments.
 *
 * Chunking and embedding finish before anything is written, so a failed
 * embedding request leaves the document's stored chunks untouched.
 */

import type { ChunkStore } from '../database/chunk-store.js';
import type { Chunk, ChunkRecord } from '../database/schema.js';
import type { Config } from '../config/schema.js';
import type { Tokenizer } from '../tokenizer/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { chunkDocument, chunkOptionsFromConfig, type ChunkOptions } from './chunker/index.js';
import { embedChunks, type EmbeddingClient, type EmbeddedChunk } from './embedder/index.js';

export type IngestStage = 'chunking' | 'embedding' | 'storing';

export interface StageStats {
  stage: IngestStage;
  /** Chunks that went through the stage */
  processed: number;
  durationMs: number;
}

/**
 * Progress callbacks for one ingest call.
 */
export interface IngestCallbacks {
  onStageStart?: (stage: IngestStage, total: number) => void;
  onProgress?: (stage: IngestStage, processed: number, total: number) => void;
  onStageComplete?: (stage: IngestStage, stats: StageStats) => void;
}

export interface IngestionPipelineOptions {
  tokenizer: Tokenizer;
  embedder: EmbeddingClient;
  store: Pick<ChunkStore, 'replaceChunks'>;
  chunking: ChunkOptions;
  /** Chunks per embedding request (default: 100) */
  batchSize?: number;
  logger?: Logger;
}

/**
 * The row shape replaceChunks takes for an embedded chunk.
 */
export function toChunkRecord(chunk: EmbeddedChunk): ChunkRecord {
  return {
    chunkIndex: chunk.index,
    content: chunk.content,
    embedding: chunk.embedding,
    tokenCount: chunk.tokenCount,
    startChar: chunk.startChar,
    endChar: chunk.endChar,
  };
}

export class IngestionPipeline {
  private readonly options: IngestionPipelineOptions;
  private readonly logger: Logger;

  constructor(options: IngestionPipelineOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Chunk and embed `text` without touching the store.
   *
   * Empty or whitespace-only text yields no records and makes no
   * embedding request.
   *
   * @throws ValidationError when the chunking options are invalid
   * @throws ProviderError | TimeoutError when an embedding request fails
   */
  async prepare(text: string, callbacks: IngestCallbacks = {}): Promise<ChunkRecord[]> {
    const { onStageStart, onProgress, onStageComplete } = callbacks;

    // =========================================================================
    // STAGE 1: CHUNKING
    // =========================================================================
    const chunkStart = performance.now();
    onStageStart?.('chunking', text.length);

    const chunks = chunkDocument(text, this.options.tokenizer, this.options.chunking);

    onStageComplete?.('chunking', {
      stage: 'chunking',
      processed: chunks.length,
      durationMs: Math.round(performance.now() - chunkStart),
    });
    this.logger.debug?.(`Chunked ${text.length} characters into ${chunks.length} chunks`);

    // =========================================================================
    // STAGE 2: EMBEDDING
    // =========================================================================
    const embedStart = performance.now();
    onStageStart?.('embedding', chunks.length);

    const embedded = await embedChunks(chunks, this.options.embedder, {
      batchSize: this.options.batchSize,
      onProgress: (processed, total) => onProgress?.('embedding', processed, total),
    });

    onStageComplete?.('embedding', {
      stage: 'embedding',
      processed: embedded.length,
      durationMs: Math.round(performance.now() - embedStart),
    });

    return embedded.map(toChunkRecord);
  }

  /**
   * Replace a document's chunks with ones computed from `text`.
   *
   * The document must already exist. Called inside a caller's transaction
   * the write joins it.
   *
   * @returns the stored chunks, ordered by chunkIndex
   */
  async ingest(documentId: number, text: string, callbacks: IngestCallbacks = {}): Promise<Chunk[]> {
    const records = await this.prepare(text, callbacks);
    return this.write(documentId, records, callbacks);
  }

  /**
   * Write prepared records for a document.
   */
  write(documentId: number, records: ChunkRecord[], callbacks: IngestCallbacks = {}): Chunk[] {
    const storeStart = performance.now();
    callbacks.onStageStart?.('storing', records.length);

    const stored = this.options.store.replaceChunks(documentId, records);

    callbacks.onStageComplete?.('storing', {
      stage: 'storing',
      processed: stored.length,
      durationMs: Math.round(performance.now() - storeStart),
    });
    this.logger.debug?.(`Stored ${stored.length} chunks for document ${documentId}`);
    return stored;
  }
}

export function createIngestionPipeline(
  config: Pick<Config, 'chunking' | 'embedding'>,
  deps: Pick<IngestionPipelineOptions, 'tokenizer' | 'embedder' | 'store' | 'logger'>
): IngestionPipeline {
  return new IngestionPipeline({
    ...deps,
    chunking: chunkOptionsFromConfig(config.chunking),
    batchSize: config.embedding.batch_size,
  });
}
