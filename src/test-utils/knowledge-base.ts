/**
 * A knowledge base over in-memory SQLite and the in-process providers.
 */

import type Database from 'better-sqlite3';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import type { UsageRecord, UsageSink } from '../indexer/embedder/types.js';
import { createKnowledgeBase, type KnowledgeBase } from '../knowledge-base.js';
import { createTestDatabase } from './database.js';
import { KeywordEmbeddingProvider, StaticGenerationProvider } from './fake-providers.js';
import { AI_GUIDE_VOCABULARY } from './fixtures.js';
import { WordTokenizer } from './word-tokenizer.js';

export class MemoryUsageSink implements UsageSink {
  readonly records: UsageRecord[] = [];

  record(usage: UsageRecord): void {
    this.records.push(usage);
  }
}

export interface TestKnowledgeBase {
  kb: KnowledgeBase;
  db: Database.Database;
  config: Config;
  embeddings: KeywordEmbeddingProvider;
  generator: StaticGenerationProvider;
  usage: MemoryUsageSink;
}

/**
 * Chunks of at most 25 words without overlap, so AI_GUIDE splits into
 * one chunk per paragraph.
 */
export function createTestKnowledgeBase(answer = 'Stub answer'): TestKnowledgeBase {
  const embeddings = new KeywordEmbeddingProvider(AI_GUIDE_VOCABULARY);
  const config: Config = {
    ...DEFAULT_CONFIG,
    embedding: { ...DEFAULT_CONFIG.embedding, model: 'test-embed', dimensions: embeddings.dimensions },
    chunking: { max_tokens_per_chunk: 25, overlap_tokens: 0 },
  };
  const db = createTestDatabase();
  const generator = new StaticGenerationProvider(answer);
  const usage = new MemoryUsageSink();

  const kb = createKnowledgeBase(config, {
    db,
    embeddingProvider: embeddings,
    generationProvider: generator,
    tokenizer: new WordTokenizer(),
    usageSink: usage,
  });

  return { kb, db, config, embeddings, generator, usage };
}
