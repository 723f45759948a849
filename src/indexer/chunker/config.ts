/**
 * Chunker Configuration
 */

import { ValidationError } from '../../errors/index.js';
import type { ChunkingConfig } from '../../config/schema.js';
import type { ChunkOptions } from './types.js';

/**
 * Sizes used when nothing else is configured. 8000 tokens sits just under
 * the 8191-token input limit of the OpenAI embedding models.
 */
export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  maxTokensPerChunk: 8000,
  overlapTokens: 200,
};

/**
 * Chunk options from the [chunking] config section.
 */
export function chunkOptionsFromConfig(config: ChunkingConfig): ChunkOptions {
  return {
    maxTokensPerChunk: config.max_tokens_per_chunk,
    overlapTokens: config.overlap_tokens,
  };
}

/**
 * @throws ValidationError listing every problem with the options
 */
export function validateChunkOptions(options: ChunkOptions): void {
  const issues: string[] = [];
  const { maxTokensPerChunk, overlapTokens } = options;

  if (!Number.isInteger(maxTokensPerChunk) || maxTokensPerChunk < 1) {
    issues.push(`maxTokensPerChunk must be a positive integer (got ${maxTokensPerChunk})`);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    issues.push(`overlapTokens must be a non-negative integer (got ${overlapTokens})`);
  }
  if (issues.length === 0 && overlapTokens >= maxTokensPerChunk) {
    issues.push(
      `overlapTokens (${overlapTokens}) must be less than maxTokensPerChunk (${maxTokensPerChunk})`
    );
  }

  if (issues.length > 0) {
    throw new ValidationError('Invalid chunking options', issues);
  }
}
