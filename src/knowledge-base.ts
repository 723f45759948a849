/**
 * Knowledge Base
 *
 * Wires storage, the embedding client, the ingestion pipeline, the
 * retriever and the RAG engine together from one loaded config. The CLI
 * builds one per command; library users can inject their own providers
 * and database.
 *
 * @example
 * ```typescript
 * const kb = createKnowledgeBase(loadConfig());
 *
 * const { document } = await kb.documents.upload('guide.txt', bytes);
 * const outcome = await kb.search('What is machine learning?');
 * const result = await kb.answer('What is machine learning?');
 * ```
 */

import type Database from 'better-sqlite3';
import { createRAGEngine, type RAGEngine } from './agent/rag-engine.js';
import type { RAGResult, StateChangeListener } from './agent/types.js';
import type { Config } from './config/schema.js';
import { getUsageLogPath } from './config/paths.js';
import { ChunkStore } from './database/chunk-store.js';
import { getDb } from './database/connection.js';
import { runMigrations } from './database/migrate.js';
import { DocumentRepository } from './database/operations.js';
import type { Chunk } from './database/schema.js';
import { StorageError } from './errors/index.js';
import { DocumentService } from './indexer/documents.js';
import { createEmbeddingClient, type EmbeddingClient } from './indexer/embedder/client.js';
import { FileUsageLog } from './indexer/embedder/usage-log.js';
import type { UsageSink } from './indexer/embedder/types.js';
import { createIngestionPipeline, type IngestCallbacks, type IngestionPipeline } from './indexer/pipeline.js';
import { createOpenAIEmbeddingProvider, createOpenAIGenerationProvider } from './providers/openai.js';
import type {
  EmbeddingProvider,
  EmbeddingResponse,
  GenerationProvider,
  GenerationRequest,
  GenerationResponse,
  ProviderRequestOptions,
} from './providers/types.js';
import { createRetriever, type Retriever } from './search/retriever.js';
import type { SearchOutcome } from './search/types.js';
import { createTokenizer, type Tokenizer } from './tokenizer/index.js';
import type { Logger } from './utils/logger.js';
import { silentLogger } from './utils/logger.js';

export interface KnowledgeBaseOptions {
  /** Defaults to the shared connection at <home>/docqa.db */
  db?: Database.Database;
  /** Defaults to OpenAI embeddings */
  embeddingProvider?: EmbeddingProvider;
  /** Defaults to OpenAI chat completions */
  generationProvider?: GenerationProvider;
  /** Defaults to the tiktoken encoding of the embedding model */
  tokenizer?: Tokenizer;
  /** Defaults to <home>/logs/embedding-usage.log */
  usageSink?: UsageSink;
  logger?: Logger;
  onStateChange?: StateChangeListener;
}

/**
 * The OpenAI providers are built on first use, so commands that never
 * call the API (list, remove) work without an API key. A missing key then
 * surfaces from the call itself.
 */
class DeferredEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  private provider: EmbeddingProvider | null = null;

  constructor(private readonly create: () => EmbeddingProvider) {}

  async embed(texts: string[], model: string, options?: ProviderRequestOptions): Promise<EmbeddingResponse> {
    if (!this.provider) {
      this.provider = this.create();
    }
    return this.provider.embed(texts, model, options);
  }
}

class DeferredGenerationProvider implements GenerationProvider {
  readonly name = 'openai';
  private provider: GenerationProvider | null = null;

  constructor(private readonly create: () => GenerationProvider) {}

  async generate(request: GenerationRequest, options?: ProviderRequestOptions): Promise<GenerationResponse> {
    if (!this.provider) {
      this.provider = this.create();
    }
    return this.provider.generate(request, options);
  }
}

export class KnowledgeBase {
  readonly documents: DocumentService;
  readonly pipeline: IngestionPipeline;
  readonly retriever: Retriever;
  readonly store: ChunkStore;
  readonly embedder: EmbeddingClient;

  private readonly engine: RAGEngine;

  /**
   * @throws ValidationError when the configured prompts are unusable
   */
  constructor(
    config: Config,
    private readonly db: Database.Database,
    private readonly options: KnowledgeBaseOptions
  ) {
    const logger = options.logger ?? silentLogger;
    const tokenizer = options.tokenizer ?? createTokenizer(config.embedding.model);

    this.store = new ChunkStore(db);
    this.embedder = createEmbeddingClient(config.embedding, {
      provider:
        options.embeddingProvider ??
        new DeferredEmbeddingProvider(() =>
          createOpenAIEmbeddingProvider({ timeoutMs: config.embedding.timeout_ms })
        ),
      tokenizer,
      usageSink: options.usageSink ?? new FileUsageLog(getUsageLogPath()),
      logger,
    });
    this.pipeline = createIngestionPipeline(config, {
      tokenizer,
      embedder: this.embedder,
      store: this.store,
      logger,
    });
    this.documents = new DocumentService({
      documents: new DocumentRepository(db),
      pipeline: this.pipeline,
      logger,
    });
    this.retriever = createRetriever(config.search, { embedder: this.embedder, store: this.store });
    this.engine = createRAGEngine(config, {
      embedder: this.embedder,
      retriever: this.retriever,
      generator:
        options.generationProvider ??
        new DeferredGenerationProvider(() =>
          createOpenAIGenerationProvider({ timeoutMs: config.generation.timeout_ms })
        ),
      logger,
      onStateChange: options.onStateChange,
    });
  }

  /**
   * Recompute and store a document's chunks from its text.
   *
   * @returns the stored chunks; empty for empty text
   */
  ingest(documentId: number, text: string, callbacks?: IngestCallbacks): Promise<Chunk[]> {
    return this.pipeline.ingest(documentId, text, callbacks);
  }

  /**
   * Ranked chunks for a query, or the explicit empty outcome.
   */
  search(query: string, topK?: number): Promise<SearchOutcome> {
    return this.retriever.search(query, topK);
  }

  /**
   * Answer a question from the stored chunks. Failures come back as
   * `{ success: false }`.
   */
  answer(query: string, topK?: number): Promise<RAGResult> {
    return this.engine.answer(query, { topK });
  }

  /**
   * Database closed here only when the caller passed it in; the shared
   * connection closes on process exit.
   */
  close(): void {
    if (this.options.db) {
      this.db.close();
    }
  }
}

/**
 * Open the database, apply migrations and build every component.
 *
 * @throws StorageError when a migration fails
 * @throws ValidationError when the configured prompts are unusable
 */
export function createKnowledgeBase(config: Config, options: KnowledgeBaseOptions = {}): KnowledgeBase {
  const db = options.db ?? getDb({ busyTimeoutMs: config.storage.busy_timeout_ms });

  const migrations = runMigrations(db);
  if (migrations.failed.length > 0) {
    const [first] = migrations.failed;
    throw new StorageError(`Database migration ${first.name} failed: ${first.error}`);
  }

  return new KnowledgeBase(config, db, options);
}
