/**
 * Document Repository
 *
 * Typed access to the documents table. Every statement runs through
 * withStorageErrors, so driver failures surface as StorageError.
 */

import type Database from 'better-sqlite3';
import { DocumentNotFoundError } from '../errors/index.js';
import { withStorageErrors } from './errors.js';
import { toDocument, type Document, type DocumentInput } from './schema.js';
import {
  CountRowSchema,
  DocumentRowSchema,
  DocumentSummaryRowSchema,
  validateRow,
  validateRows,
} from './validation.js';

export interface DocumentSummary extends Document {
  chunkCount: number;
}

export interface DocumentPage {
  documents: DocumentSummary[];
  /** Documents across all pages */
  total: number;
  page: number;
  perPage: number;
}

export class DocumentRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Run `work` in one transaction. Nested calls become savepoints, so
   * ChunkStore.replaceChunks can join an outer transaction.
   */
  transaction<T>(work: () => T): T {
    return withStorageErrors(this.db, 'Transaction', () => this.db.transaction(work)());
  }

  create(input: DocumentInput): Document {
    return withStorageErrors(this.db, 'Creating document', () => {
      const now = new Date().toISOString();
      const result = this.db
        .prepare(
          `INSERT INTO documents (filename, checksum, file_size, created_at, updated_at)
           VALUES (@filename, @checksum, @fileSize, @now, @now)`
        )
        .run({ filename: input.filename, checksum: input.checksum, fileSize: input.fileSize, now });

      return this.require(Number(result.lastInsertRowid));
    });
  }

  get(id: number): Document | undefined {
    return withStorageErrors(this.db, 'Reading document', () => {
      const row = this.db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
      return row ? toDocument(validateRow(DocumentRowSchema, row, `documents.id=${id}`)) : undefined;
    });
  }

  /**
   * @throws DocumentNotFoundError when no document has this id
   */
  require(id: number): Document {
    const document = this.get(id);
    if (!document) {
      throw new DocumentNotFoundError(id);
    }
    return document;
  }

  findByChecksum(checksum: string): Document | undefined {
    return withStorageErrors(this.db, 'Reading document', () => {
      const row = this.db.prepare('SELECT * FROM documents WHERE checksum = ?').get(checksum);
      return row
        ? toDocument(validateRow(DocumentRowSchema, row, `documents.checksum=${checksum}`))
        : undefined;
    });
  }

  /**
   * Replace a document's filename, checksum and size.
   *
   * @throws DocumentNotFoundError when no document has this id
   */
  update(id: number, input: DocumentInput): Document {
    return withStorageErrors(this.db, 'Updating document', () => {
      const result = this.db
        .prepare(
          `UPDATE documents
           SET filename = @filename, checksum = @checksum, file_size = @fileSize, updated_at = @now
           WHERE id = @id`
        )
        .run({
          id,
          filename: input.filename,
          checksum: input.checksum,
          fileSize: input.fileSize,
          now: new Date().toISOString(),
        });

      if (result.changes === 0) {
        throw new DocumentNotFoundError(id);
      }
      return this.require(id);
    });
  }

  /**
   * Bump updated_at without changing content.
   */
  touch(id: number): Document {
    return withStorageErrors(this.db, 'Updating document', () => {
      const result = this.db
        .prepare('UPDATE documents SET updated_at = ? WHERE id = ?')
        .run(new Date().toISOString(), id);
      if (result.changes === 0) {
        throw new DocumentNotFoundError(id);
      }
      return this.require(id);
    });
  }

  /**
   * Delete a document; its chunks go with it (ON DELETE CASCADE).
   *
   * @returns false when there was nothing to delete
   */
  delete(id: number): boolean {
    return withStorageErrors(this.db, 'Deleting document', () => {
      return this.db.prepare('DELETE FROM documents WHERE id = ?').run(id).changes > 0;
    });
  }

  /**
   * One page of documents, newest first, with chunk counts.
   */
  list(page: number = 1, perPage: number = 20): DocumentPage {
    return withStorageErrors(this.db, 'Listing documents', () => {
      const rows = this.db
        .prepare(
          `SELECT d.*, COUNT(c.id) AS chunk_count
           FROM documents d
           LEFT JOIN document_chunks c ON c.document_id = d.id
           GROUP BY d.id
           ORDER BY d.id DESC
           LIMIT ? OFFSET ?`
        )
        .all(perPage, (page - 1) * perPage);
      const { count } = validateRow(
        CountRowSchema,
        this.db.prepare('SELECT COUNT(*) AS count FROM documents').get(),
        'documents count'
      );

      const documents = validateRows(DocumentSummaryRowSchema, rows, 'documents').map((row) => ({
        ...toDocument(row),
        chunkCount: row.chunk_count,
      }));

      return { documents, total: count, page, perPage };
    });
  }
}
