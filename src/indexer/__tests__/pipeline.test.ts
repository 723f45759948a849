/**
 * Ingestion Pipeline Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { IngestionPipeline, createIngestionPipeline, toChunkRecord } from '../pipeline.js';
import { EmbeddingClient } from '../embedder/index.js';
import { ChunkStore } from '../../database/chunk-store.js';
import { DocumentRepository } from '../../database/operations.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { ProviderError } from '../../errors/index.js';
import type { EmbeddingProvider } from '../../providers/types.js';
import {
  AI_GUIDE,
  AI_GUIDE_VOCABULARY,
  KeywordEmbeddingProvider,
  WordTokenizer,
  createTestDatabase,
} from '../../test-utils/index.js';

function clientFor(provider: EmbeddingProvider): EmbeddingClient {
  return new EmbeddingClient({
    provider,
    tokenizer: new WordTokenizer(),
    model: 'test-embed',
    timeoutMs: 1000,
    pricing: { prices: {}, defaultPricePer1k: 0 },
  });
}

describe('IngestionPipeline', () => {
  let db: Database.Database;
  let store: ChunkStore;
  let documentId: number;
  let provider: KeywordEmbeddingProvider;

  function pipelineWith(embeddingProvider: EmbeddingProvider): IngestionPipeline {
    return new IngestionPipeline({
      tokenizer: new WordTokenizer(),
      embedder: clientFor(embeddingProvider),
      store,
      chunking: { maxTokensPerChunk: 25, overlapTokens: 0 },
    });
  }

  beforeEach(() => {
    db = createTestDatabase();
    store = new ChunkStore(db);
    provider = new KeywordEmbeddingProvider(AI_GUIDE_VOCABULARY);
    documentId = new DocumentRepository(db).create({
      filename: 'ai-guide.txt',
      checksum: 'guide',
      fileSize: AI_GUIDE.length,
    }).id;
  });

  afterEach(() => {
    db.close();
  });

  it('chunks, embeds and stores a document', async () => {
    const chunks = await pipelineWith(provider).ingest(documentId, AI_GUIDE);

    expect(chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2, 3, 4]);
    expect(chunks[1].content).toContain('Machine Learning is a subset of AI');
    expect(chunks.every((c) => c.embedding instanceof Float32Array)).toBe(true);
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0]).toHaveLength(5);
    expect(store.countChunks(documentId)).toBe(5);
  });

  it('returns no chunks for empty text', async () => {
    await expect(pipelineWith(provider).ingest(documentId, '')).resolves.toEqual([]);
    await expect(pipelineWith(provider).ingest(documentId, '  \n\t ')).resolves.toEqual([]);

    expect(provider.calls).toEqual([]);
    expect(store.countChunks(documentId)).toBe(0);
  });

  it('replaces the chunks of an earlier ingest', async () => {
    const pipeline = pipelineWith(provider);
    await pipeline.ingest(documentId, AI_GUIDE);

    const chunks = await pipeline.ingest(documentId, 'Only one sentence here.');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ chunkIndex: 0, content: 'Only one sentence here.', startChar: 0, endChar: 23 });
    expect(store.countChunks(documentId)).toBe(1);
  });

  it('leaves stored chunks alone when embedding fails', async () => {
    await pipelineWith(provider).ingest(documentId, AI_GUIDE);
    const failing: EmbeddingProvider = {
      name: 'failing',
      embed: vi.fn<EmbeddingProvider['embed']>().mockRejectedValue(new Error('connection reset')),
    };

    await expect(pipelineWith(failing).ingest(documentId, 'Replacement text.')).rejects.toBeInstanceOf(
      ProviderError
    );
    expect(store.countChunks(documentId)).toBe(5);
  });

  it('reports each stage in order', async () => {
    const onStageStart = vi.fn();
    const onStageComplete = vi.fn();
    const onProgress = vi.fn();

    await pipelineWith(provider).ingest(documentId, AI_GUIDE, { onStageStart, onStageComplete, onProgress });

    expect(onStageStart.mock.calls.map(([stage]) => stage)).toEqual(['chunking', 'embedding', 'storing']);
    expect(onStageComplete.mock.calls.map(([stage, stats]) => [stage, stats.processed])).toEqual([
      ['chunking', 5],
      ['embedding', 5],
      ['storing', 5],
    ]);
    expect(onProgress).toHaveBeenCalledWith('embedding', 5, 5);
  });

  it('prepare does not write', async () => {
    const records = await pipelineWith(provider).prepare(AI_GUIDE);

    expect(records).toHaveLength(5);
    expect(store.countChunks(documentId)).toBe(0);
  });

  it('takes chunk sizes and batch size from config', async () => {
    const pipeline = createIngestionPipeline(DEFAULT_CONFIG, {
      tokenizer: new WordTokenizer(),
      embedder: clientFor(provider),
      store,
    });

    const chunks = await pipeline.ingest(documentId, AI_GUIDE);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].startChar).toBe(0);
    expect(chunks[0].endChar).toBe(AI_GUIDE.length);
  });
});

describe('toChunkRecord', () => {
  it('maps an embedded chunk to a stored record', () => {
    const embedding = new Float32Array([0.5, 0.25]);

    expect(
      toChunkRecord({ index: 2, content: 'Text.', tokenCount: 1, startChar: 10, endChar: 15, embedding })
    ).toEqual({ chunkIndex: 2, content: 'Text.', tokenCount: 1, startChar: 10, endChar: 15, embedding });
  });
});
