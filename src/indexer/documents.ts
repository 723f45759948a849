/**
 * Document Lifecycle
 *
 * Upload, reupload, removal and listing of documents. Each upload runs
 * the ingestion pipeline; the document row and its chunks are written in
 * one transaction once every chunk has its embedding.
 */

import { createHash } from 'node:crypto';
import type { DocumentRepository, DocumentPage } from '../database/operations.js';
import type { Chunk, Document } from '../database/schema.js';
import { DuplicateDocumentError, ValidationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { IngestCallbacks, IngestionPipeline } from './pipeline.js';

/** File types whose bytes are plain UTF-8 text */
export const SUPPORTED_FILE_TYPES = ['txt', 'md'] as const;
export type SupportedFileType = (typeof SUPPORTED_FILE_TYPES)[number];

const MAX_FILENAME_LENGTH = 255;
const MAX_PER_PAGE = 100;

export interface UploadResult {
  document: Document;
  chunks: Chunk[];
}

export interface ReuploadResult extends UploadResult {
  /** False when the new bytes have the stored checksum */
  contentChanged: boolean;
}

function isSupportedFileType(fileType: string): fileType is SupportedFileType {
  return SUPPORTED_FILE_TYPES.some((supported) => supported === fileType);
}

/**
 * Lowercase extension without the dot; '' when there is none.
 */
export function fileTypeOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(dot + 1).toLowerCase() : '';
}

/**
 * Strip path separators and characters that are unsafe in filenames.
 */
export function sanitizeFilename(filename: string): string {
  const cleaned = filename.replace(/[/\\<>:"|?*]/g, '_');
  if (cleaned.length <= MAX_FILENAME_LENGTH) {
    return cleaned;
  }
  const dot = cleaned.lastIndexOf('.');
  const extension = dot > 0 ? cleaned.slice(dot) : '';
  return cleaned.slice(0, MAX_FILENAME_LENGTH - extension.length) + extension;
}

/**
 * SHA-256 of the uploaded bytes, hex.
 */
export function checksumOf(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Decode an uploaded file to text.
 *
 * @throws ValidationError for unsupported types and bytes that aren't UTF-8
 */
export function extractText(bytes: Uint8Array, fileType: string): string {
  const type = fileType.toLowerCase();
  if (!isSupportedFileType(type)) {
    throw new ValidationError(`Unsupported file type: ${type || '(none)'}`, [
      `Supported types: ${SUPPORTED_FILE_TYPES.join(', ')}`,
    ]);
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ValidationError('File is not valid UTF-8 text', [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

export interface DocumentServiceDeps {
  documents: DocumentRepository;
  pipeline: IngestionPipeline;
  logger?: Logger;
}

export class DocumentService {
  private readonly documents: DocumentRepository;
  private readonly pipeline: IngestionPipeline;
  private readonly logger: Logger;

  constructor(deps: DocumentServiceDeps) {
    this.documents = deps.documents;
    this.pipeline = deps.pipeline;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Store a new document and its chunks.
   *
   * @throws ValidationError for unsupported or empty files
   * @throws DuplicateDocumentError when the same bytes are already stored
   * @throws ProviderError | TimeoutError when embedding fails; nothing is written
   */
  async upload(filename: string, bytes: Uint8Array, callbacks?: IngestCallbacks): Promise<UploadResult> {
    const name = sanitizeFilename(filename);
    const text = this.readText(name, bytes);
    const checksum = checksumOf(bytes);

    this.assertUnique(name, checksum);
    const records = await this.pipeline.prepare(text, callbacks);

    const result = this.documents.transaction(() => {
      // Another upload of the same bytes may have committed while we embedded
      this.assertUnique(name, checksum);
      const document = this.documents.create({ filename: name, checksum, fileSize: bytes.length });
      const chunks = this.pipeline.write(document.id, records, callbacks);
      return { document, chunks };
    });

    this.logger.info?.(`Stored ${name} as document ${result.document.id} (${result.chunks.length} chunks)`);
    return result;
  }

  /**
   * Replace a document's content and regenerate its chunks.
   *
   * Identical bytes still get fresh embeddings; the chunk contents and
   * offsets come out the same. Two reuploads of one document race and the
   * last commit wins.
   *
   * @throws DocumentNotFoundError when the id is unknown
   * @throws DuplicateDocumentError when another document holds these bytes
   */
  async reupload(
    documentId: number,
    filename: string,
    bytes: Uint8Array,
    callbacks?: IngestCallbacks
  ): Promise<ReuploadResult> {
    const existing = this.documents.require(documentId);
    const name = sanitizeFilename(filename);
    const text = this.readText(name, bytes);
    const checksum = checksumOf(bytes);

    this.assertUnique(name, checksum, documentId);
    const records = await this.pipeline.prepare(text, callbacks);
    const contentChanged = checksum !== existing.checksum;

    return this.documents.transaction(() => {
      this.assertUnique(name, checksum, documentId);
      const document =
        contentChanged || name !== existing.filename
          ? this.documents.update(documentId, { filename: name, checksum, fileSize: bytes.length })
          : this.documents.touch(documentId);
      const chunks = this.pipeline.write(documentId, records, callbacks);
      return { document, chunks, contentChanged };
    });
  }

  /**
   * Delete a document and, by cascade, its chunks.
   *
   * @returns the deleted document
   * @throws DocumentNotFoundError when the id is unknown
   */
  remove(documentId: number): Document {
    return this.documents.transaction(() => {
      const document = this.documents.require(documentId);
      this.documents.delete(documentId);
      return document;
    });
  }

  get(documentId: number): Document {
    return this.documents.require(documentId);
  }

  /**
   * @throws ValidationError unless page >= 1 and 1 <= perPage <= 100
   */
  list(page: number = 1, perPage: number = 10): DocumentPage {
    const issues: string[] = [];
    if (!Number.isInteger(page) || page < 1) {
      issues.push('page must be an integer greater than 0');
    }
    if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
      issues.push(`perPage must be an integer between 1 and ${MAX_PER_PAGE}`);
    }
    if (issues.length > 0) {
      throw new ValidationError('Invalid pagination parameters', issues);
    }
    return this.documents.list(page, perPage);
  }

  private readText(filename: string, bytes: Uint8Array): string {
    const text = extractText(bytes, fileTypeOf(filename));
    if (text.trim().length === 0) {
      throw new ValidationError('Document is empty', [`${filename} has no text content`]);
    }
    return text;
  }

  private assertUnique(filename: string, checksum: string, documentId?: number): void {
    const duplicate = this.documents.findByChecksum(checksum);
    if (duplicate && duplicate.id !== documentId) {
      throw new DuplicateDocumentError(filename, duplicate.id);
    }
  }
}
