/**
 * Search Module Types
 */

import type { Chunk } from '../database/schema.js';

/**
 * Descriptive label for a result set's mean similarity. Reported, never
 * used to decide anything.
 */
export type QualityLabel = 'Excellent' | 'Good' | 'Fair' | 'Poor';

/**
 * A retrieved chunk with its scores.
 */
export interface ScoredChunk {
  chunk: Chunk;
  /** Filename of the owning document */
  filename: string;
  /** Cosine distance to the query, in [0, 2] */
  distance: number;
  /** 1 - distance */
  similarity: number;
  /** "<filename> (chunk <index>)", used in contexts and citations */
  sourceLabel: string;
}

/**
 * Result of a search. "Nothing found" is its own state rather than an
 * empty success.
 */
export type SearchOutcome =
  | {
      status: 'found';
      /** Best match first */
      results: ScoredChunk[];
      /** Mean of 1 / (1 + distance), in (0, 1] */
      relevanceScore: number;
      meanSimilarity: number;
      quality: QualityLabel;
    }
  | {
      status: 'empty';
      results: [];
      relevanceScore: null;
      meanSimilarity: null;
      quality: null;
    };

/**
 * Options for text formatting of results.
 */
export interface FormatOptions {
  /** Maximum snippet length in characters (default: 200) */
  snippetLength?: number;
  /** Show the similarity prefix (default: true) */
  showScore?: boolean;
  /** Show character offsets after the label (default: false) */
  showOffsets?: boolean;
}

/**
 * JSON-serializable search result for `--json` output.
 */
export interface FormattedResultJSON {
  similarity: number;
  distance: number;
  filename: string;
  documentId: number;
  chunkIndex: number;
  startChar: number;
  endChar: number;
  content: string;
}
