/**
 * Database Schema Types
 *
 * Row shapes as SQLite returns them, the typed records the rest of the
 * code works with, and the adapters between the two.
 */

import { StorageError } from '../errors/index.js';

// ============================================================================
// Documents Table
// ============================================================================

export interface DocumentRow {
  id: number;
  filename: string;
  checksum: string;
  file_size: number;
  created_at: string;
  updated_at: string;
}

/**
 * An uploaded document. Owns zero or more chunks; deleting it deletes them.
 */
export interface Document {
  id: number;
  filename: string;
  /** SHA-256 of the uploaded bytes, hex */
  checksum: string;
  fileSize: number;
  createdAt: string;
  updatedAt: string;
}

export interface DocumentInput {
  filename: string;
  checksum: string;
  fileSize: number;
}

// ============================================================================
// Document Chunks Table
// ============================================================================

export interface ChunkRow {
  id: number;
  document_id: number;
  chunk_index: number;
  content: string;
  embedding: Buffer | null;
  token_count: number;
  start_char: number;
  end_char: number;
  created_at: string;
  updated_at: string;
}

/**
 * A stored chunk of a document's text.
 */
export interface Chunk {
  id: number;
  documentId: number;
  /** Zero-based position within the document */
  chunkIndex: number;
  content: string;
  /** Null when the chunk was stored without a vector */
  embedding: Float32Array | null;
  tokenCount: number;
  startChar: number;
  /** Exclusive */
  endChar: number;
  createdAt: string;
  updatedAt: string;
}

/**
 * What replaceChunks writes for each chunk.
 */
export interface ChunkRecord {
  chunkIndex: number;
  content: string;
  embedding: Float32Array | null;
  tokenCount: number;
  startChar: number;
  endChar: number;
}

// ============================================================================
// Adapters
// ============================================================================

export function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    filename: row.filename,
    checksum: row.checksum,
    fileSize: row.file_size,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.document_id,
    chunkIndex: row.chunk_index,
    content: row.content,
    embedding: row.embedding ? blobToEmbedding(row.embedding) : null,
    tokenCount: row.token_count,
    startChar: row.start_char,
    endChar: row.end_char,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Convert Float32Array to Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob(new Float32Array([0.1, 0.2, 0.3]));
 * db.prepare('UPDATE document_chunks SET embedding = ? WHERE id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert a BLOB back to Float32Array.
 *
 * The bytes are copied: a Buffer from SQLite can start at an offset that
 * isn't a multiple of 4, which a Float32Array view can't.
 *
 * @throws StorageError when the BLOB length isn't a whole number of floats
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  if (blob.length % Float32Array.BYTES_PER_ELEMENT !== 0) {
    throw new StorageError(`Corrupt embedding BLOB of ${blob.length} bytes`);
  }
  const bytes = new Uint8Array(blob.length);
  bytes.set(blob);
  return new Float32Array(bytes.buffer);
}
