/**
 * Database Row Validation
 *
 * Zod schemas for database reads. better-sqlite3 returns `unknown` rows;
 * validating them keeps schema drift (a failed migration, a hand-edited
 * database) from turning into silently wrong data.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
 * return row ? validateRow(DocumentRowSchema, row, `documents.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { StorageError } from '../errors/index.js';

export const DocumentRowSchema = z.object({
  id: z.number().int().positive(),
  filename: z.string(),
  checksum: z.string(),
  file_size: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const ChunkRowSchema = z.object({
  id: z.number().int().positive(),
  document_id: z.number().int().positive(),
  chunk_index: z.number().int().nonnegative(),
  content: z.string(),
  // better-sqlite3 returns BLOBs as Buffers
  embedding: z.instanceof(Buffer).nullable(),
  token_count: z.number().int().nonnegative(),
  start_char: z.number().int().nonnegative(),
  end_char: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
});

/** A chunk joined with its document's filename, as nearest() reads it */
export const ChunkWithFilenameRowSchema = ChunkRowSchema.extend({
  filename: z.string(),
});

/** A document with the number of chunks it owns */
export const DocumentSummaryRowSchema = DocumentRowSchema.extend({
  chunk_count: z.number().int().nonnegative(),
});

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

/**
 * Thrown when a database row doesn't match what the code expects.
 */
export class SchemaValidationError extends StorageError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(context: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const shown = issues
      .slice(0, 3)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const more = issues.length > 3 ? ` (and ${issues.length - 3} more)` : '';

    super(`Database schema mismatch in ${context}: ${shown}${more}`);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * @throws SchemaValidationError if the row doesn't match
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(context, result.error.issues);
}

/**
 * Validate every row; the first mismatch throws, naming its position.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
