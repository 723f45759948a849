/**
 * Chunk Store
 *
 * Persists chunks per document and answers nearest-neighbor queries.
 *
 * - replaceChunks swaps a document's whole chunk set in one transaction.
 *   Under WAL a concurrent reader sees the old set or the new one, never
 *   a mix. Two replaces of the same document race; the last commit wins.
 * - nearest computes cosine distance over every stored vector. Chunks
 *   stored without a vector are never returned.
 *
 * Nothing here retries. A busy database waits out busy_timeout_ms, then
 * fails with StorageError.
 */

import type Database from 'better-sqlite3';
import { StorageError, ValidationError } from '../errors/index.js';
import { withStorageErrors } from './errors.js';
import { embeddingToBlob, toChunk, type Chunk, type ChunkRecord } from './schema.js';
import { cosineDistance } from './similarity.js';
import {
  ChunkRowSchema,
  ChunkWithFilenameRowSchema,
  CountRowSchema,
  validateRow,
  validateRows,
} from './validation.js';

export interface NearestChunk {
  chunk: Chunk;
  /** Filename of the owning document */
  filename: string;
  /** Cosine distance to the query vector */
  distance: number;
}

/** Distance first, then chunk position, then document id */
function compareNearest(a: NearestChunk, b: NearestChunk): number {
  return (
    a.distance - b.distance ||
    a.chunk.chunkIndex - b.chunk.chunkIndex ||
    a.chunk.documentId - b.chunk.documentId
  );
}

export class ChunkStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Delete a document's chunks and insert `records` in their place,
   * atomically. Joins the caller's transaction when there is one.
   *
   * @returns the stored chunks, ordered by chunkIndex
   * @throws StorageError on any database failure, including a duplicate
   *   chunkIndex; nothing is changed in that case
   */
  replaceChunks(documentId: number, records: ChunkRecord[]): Chunk[] {
    return withStorageErrors(this.db, `Replacing chunks of document ${documentId}`, () =>
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM document_chunks WHERE document_id = ?').run(documentId);

        const insert = this.db.prepare(`
          INSERT INTO document_chunks
            (document_id, chunk_index, content, embedding, token_count, start_char, end_char, created_at, updated_at)
          VALUES
            (@documentId, @chunkIndex, @content, @embedding, @tokenCount, @startChar, @endChar, @now, @now)
        `);
        const now = new Date().toISOString();

        for (const record of records) {
          insert.run({
            documentId,
            chunkIndex: record.chunkIndex,
            content: record.content,
            embedding: record.embedding ? embeddingToBlob(record.embedding) : null,
            tokenCount: record.tokenCount,
            startChar: record.startChar,
            endChar: record.endChar,
            now,
          });
        }

        return this.getChunks(documentId);
      })()
    );
  }

  /**
   * A document's chunks, ordered by chunkIndex.
   */
  getChunks(documentId: number): Chunk[] {
    return withStorageErrors(this.db, `Reading chunks of document ${documentId}`, () => {
      const rows = this.db
        .prepare('SELECT * FROM document_chunks WHERE document_id = ? ORDER BY chunk_index')
        .all(documentId);
      return validateRows(ChunkRowSchema, rows, 'document_chunks').map(toChunk);
    });
  }

  /**
   * @returns the number of chunks deleted
   */
  deleteChunks(documentId: number): number {
    return withStorageErrors(this.db, `Deleting chunks of document ${documentId}`, () => {
      return this.db.prepare('DELETE FROM document_chunks WHERE document_id = ?').run(documentId)
        .changes;
    });
  }

  /**
   * Chunks in one document, or in the whole store.
   */
  countChunks(documentId?: number): number {
    return withStorageErrors(this.db, 'Counting chunks', () => {
      const row =
        documentId === undefined
          ? this.db.prepare('SELECT COUNT(*) AS count FROM document_chunks').get()
          : this.db
              .prepare('SELECT COUNT(*) AS count FROM document_chunks WHERE document_id = ?')
              .get(documentId);
      return validateRow(CountRowSchema, row, 'document_chunks count').count;
    });
  }

  /**
   * Up to k chunks closest to `query`, best match first.
   *
   * @throws ValidationError when k is not a non-negative integer
   * @throws StorageError when a stored vector's length differs from the
   *   query's (the embedding model changed since ingestion)
   */
  nearest(query: ArrayLike<number>, k: number): NearestChunk[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new ValidationError(`k must be a non-negative integer (got ${k})`);
    }
    if (k === 0) {
      return [];
    }

    return withStorageErrors(this.db, 'Searching chunks', () => {
      const rows = this.db
        .prepare(
          `SELECT c.*, d.filename
           FROM document_chunks c
           JOIN documents d ON d.id = c.document_id
           WHERE c.embedding IS NOT NULL`
        )
        .all();

      const candidates: NearestChunk[] = [];
      for (const row of validateRows(ChunkWithFilenameRowSchema, rows, 'document_chunks')) {
        const chunk = toChunk(row);
        if (!chunk.embedding) continue;

        if (chunk.embedding.length !== query.length) {
          throw new StorageError(
            `Chunk ${chunk.id} has a ${chunk.embedding.length}-dimension embedding; ` +
              `the query has ${query.length}. Re-ingest documents after changing embedding.model`
          );
        }
        candidates.push({
          chunk,
          filename: row.filename,
          distance: cosineDistance(query, chunk.embedding),
        });
      }

      return candidates.sort(compareNearest).slice(0, k);
    });
  }
}
