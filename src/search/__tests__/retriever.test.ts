/**
 * Retriever Tests
 *
 * Real chunker, embedding client and SQLite store; the keyword provider
 * stands in for the embedding API.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { Retriever, createRetriever } from '../retriever.js';
import { ChunkStore } from '../../database/chunk-store.js';
import { DocumentRepository } from '../../database/operations.js';
import { chunkDocument } from '../../indexer/chunker/index.js';
import { EmbeddingClient, embedChunks } from '../../indexer/embedder/index.js';
import { StorageError, ValidationError } from '../../errors/index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import {
  AI_GUIDE,
  AI_GUIDE_VOCABULARY,
  KeywordEmbeddingProvider,
  WordTokenizer,
  createTestDatabase,
} from '../../test-utils/index.js';

describe('Retriever', () => {
  let db: Database.Database;
  let store: ChunkStore;
  let client: EmbeddingClient;
  let retriever: Retriever;

  beforeEach(() => {
    db = createTestDatabase();
    store = new ChunkStore(db);
    client = new EmbeddingClient({
      provider: new KeywordEmbeddingProvider(AI_GUIDE_VOCABULARY),
      tokenizer: new WordTokenizer(),
      model: 'test-embed',
      timeoutMs: 1000,
      pricing: { prices: {}, defaultPricePer1k: 0 },
    });
    retriever = new Retriever({ embedder: client, store }, 3);
  });

  afterEach(() => {
    db.close();
  });

  async function ingestGuide(): Promise<void> {
    const document = new DocumentRepository(db).create({
      filename: 'ai-guide.txt',
      checksum: 'guide',
      fileSize: AI_GUIDE.length,
    });
    const chunks = chunkDocument(AI_GUIDE, new WordTokenizer(), {
      maxTokensPerChunk: 25,
      overlapTokens: 0,
    });
    const embedded = await embedChunks(chunks, client);
    store.replaceChunks(
      document.id,
      embedded.map((c) => ({
        chunkIndex: c.index,
        content: c.content,
        embedding: c.embedding,
        tokenCount: c.tokenCount,
        startChar: c.startChar,
        endChar: c.endChar,
      }))
    );
  }

  it('finds the machine learning paragraph first', async () => {
    await ingestGuide();

    const outcome = await retriever.search('What is machine learning?');

    expect(outcome.status).toBe('found');
    if (outcome.status !== 'found') return;
    expect(outcome.results).toHaveLength(3);
    expect(outcome.results[0].chunk.content).toContain('Machine Learning is a subset of AI');
    expect(outcome.results[0].sourceLabel).toBe('ai-guide.txt (chunk 1)');
    expect(outcome.results[1].chunk.content).toContain('Deep learning uses neural networks');
  });

  it('returns similarities in non-increasing order and relevance in (0, 1]', async () => {
    await ingestGuide();

    const outcome = await retriever.search('neural networks for language and vision', 5);

    if (outcome.status !== 'found') throw new Error('expected results');
    const similarities = outcome.results.map((r) => r.similarity);
    for (let i = 1; i < similarities.length; i++) {
      expect(similarities[i]).toBeLessThanOrEqual(similarities[i - 1]);
    }
    expect(outcome.relevanceScore).toBeGreaterThan(0);
    expect(outcome.relevanceScore).toBeLessThanOrEqual(1);
  });

  it('honours top_k', async () => {
    await ingestGuide();

    const outcome = await retriever.search('machine learning', 1);

    expect(outcome.results).toHaveLength(1);
  });

  it('reports an empty outcome when nothing is stored', async () => {
    const outcome = await retriever.search('What is machine learning?');

    expect(outcome).toMatchObject({ status: 'empty', results: [], relevanceScore: null });
  });

  it('rejects an empty query and a bad top_k', async () => {
    await expect(retriever.search('   ')).rejects.toThrow(ValidationError);
    await expect(retriever.search('machine', 0)).rejects.toThrow('top_k must be a positive integer (got 0)');
  });

  it('passes storage failures through', async () => {
    const failing = new Retriever(
      {
        embedder: client,
        store: {
          nearest: vi.fn(() => {
            throw new StorageError('database is locked');
          }),
        },
      },
      3
    );

    await expect(failing.search('machine')).rejects.toThrow(StorageError);
  });
});

describe('createRetriever', () => {
  it('uses the configured default top_k', () => {
    const retriever = createRetriever(DEFAULT_CONFIG.search, {
      embedder: { embedOne: vi.fn() },
      store: { nearest: vi.fn() },
    });

    expect(retriever.defaultTopK).toBe(3);
  });
});
