/**
 * Indexer Module
 *
 * Turns document text into stored, embedded chunks.
 *
 * @example
 * ```ts
 * import { createIngestionPipeline } from './indexer/index.js';
 *
 * const pipeline = createIngestionPipeline(config, { tokenizer, embedder, store });
 * const chunks = await pipeline.ingest(document.id, text);
 * ```
 */

// Chunker module
export {
  chunkText,
  chunkDocument,
  splitSentences,
  lastSentenceEnd,
  DEFAULT_CHUNK_OPTIONS,
  chunkOptionsFromConfig,
  validateChunkOptions,
  type ChunkDescriptor,
  type ChunkOptions,
  type TextSpan,
} from './chunker/index.js';

// Embedder module
export {
  EmbeddingClient,
  createEmbeddingClient,
  embedChunks,
  FileUsageLog,
  formatUsageLine,
  computeCost,
  parseUsageLine,
  summarizeUsage,
  type EmbeddedChunk,
  type EmbedderOptions,
  type PriceTable,
  type UsageRecord,
  type UsageSink,
  type UsageSummary,
} from './embedder/index.js';

// Pipeline orchestration
export {
  IngestionPipeline,
  createIngestionPipeline,
  toChunkRecord,
  type IngestStage,
  type IngestCallbacks,
  type IngestionPipelineOptions,
  type StageStats,
} from './pipeline.js';

// Document lifecycle
export {
  DocumentService,
  extractText,
  checksumOf,
  fileTypeOf,
  sanitizeFilename,
  SUPPORTED_FILE_TYPES,
  type DocumentServiceDeps,
  type SupportedFileType,
  type UploadResult,
  type ReuploadResult,
} from './documents.js';
