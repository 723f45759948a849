/**
 * Database Module
 *
 * SQLite storage for documents and their chunks.
 *
 * @example
 * ```ts
 * import { getDb, runMigrations, ChunkStore } from './database/index.js';
 *
 * const db = getDb();
 * runMigrations(db);
 * const store = new ChunkStore(db);
 * const nearest = store.nearest(queryVector, 3);
 * ```
 */

// Connection management
export { openDatabase, getDb, closeDb, getDbPath, type DatabaseOptions } from './connection.js';

// Migrations
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Schema types and adapters
export type { Document, DocumentInput, DocumentRow, Chunk, ChunkRecord, ChunkRow } from './schema.js';
export { toDocument, toChunk, embeddingToBlob, blobToEmbedding } from './schema.js';

// Row validation
export {
  DocumentRowSchema,
  ChunkRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

export { withStorageErrors } from './errors.js';
export { cosineDistance } from './similarity.js';

// Repositories
export {
  DocumentRepository,
  type DocumentSummary,
  type DocumentPage,
} from './operations.js';
export { ChunkStore, type NearestChunk } from './chunk-store.js';
