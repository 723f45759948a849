/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js hands every option over as a string; these schemas coerce
 * and range-check them before a command does any work.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/** String option holding a positive integer, e.g. "--top 5" */
const positiveInt = (name: string, max?: number) => {
  const base = z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be a whole number`)
    .min(1, `${name} must be at least 1`);
  return max === undefined ? base : base.max(max, `${name} must be at most ${max}`);
};

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  replace: positiveInt('--replace').optional(),
});

// ============================================================================
// LIST / REMOVE COMMAND SCHEMAS
// ============================================================================

export const ListOptionsSchema = z.object({
  page: positiveInt('--page').default(1),
  perPage: positiveInt('--per-page', 100).default(10),
});

export const DocumentIdSchema = positiveInt('Document id');

// ============================================================================
// SEARCH / ASK COMMAND SCHEMAS
// ============================================================================

export const QuerySchema = z
  .string()
  .trim()
  .min(1, 'Query cannot be empty')
  .max(1000, 'Query too long (max 1000 chars)');

export const TopKOptionsSchema = z.object({
  top: positiveInt('--top', 100).optional(),
});

// ============================================================================
// USAGE COMMAND SCHEMA
// ============================================================================

export const UsageOptionsSchema = z.object({
  days: positiveInt('--days').optional(),
  log: z.string().min(1).optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @example
 * ```typescript
 * const { top } = parseInput(TopKOptionsSchema, cmdOptions);
 * ```
 *
 * @throws ValidationError listing every issue
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError('Invalid command input', issues);
}
