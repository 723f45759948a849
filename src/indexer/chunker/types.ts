/**
 * Chunker Types
 */

/**
 * One chunk of a document, as produced by the chunker.
 *
 * `content` is always `text.slice(startChar, endChar)` of the source
 * document, so offsets and content can never disagree.
 */
export interface ChunkDescriptor {
  /** Zero-based position within the document */
  index: number;
  content: string;
  tokenCount: number;
  /** Offset of the first character in the document text */
  startChar: number;
  /** Offset one past the last character (exclusive) */
  endChar: number;
}

/**
 * Options controlling chunk size.
 */
export interface ChunkOptions {
  /** Upper bound on tokens per chunk */
  maxTokensPerChunk: number;
  /** Tokens from the end of a chunk repeated at the start of the next */
  overlapTokens: number;
}

/**
 * A span of the document text, half-open like the chunk offsets.
 */
export interface TextSpan {
  start: number;
  end: number;
}
