/**
 * Context assembly
 *
 * Builds the {context} text for the user prompt: one block per chunk,
 * best match first, each headed by its source label:
 *
 *   [guide.txt (chunk 2)]
 *   Machine Learning is a subset of AI. ...
 *
 *   ---
 *
 *   [notes.md (chunk 0)]
 *   ...
 *
 * Each chunk is cut to maxContextLength characters, at the last sentence
 * end that fits when there is one.
 */

import { lastSentenceEnd } from '../indexer/chunker/sentences.js';
import type { ScoredChunk } from './types.js';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

/** Stands in for the context when retrieval found nothing */
export const NO_CONTEXT_NOTICE =
  'No relevant information was found in the knowledge base for this question.';

/**
 * Cut text to at most maxLength characters without splitting a sentence,
 * falling back to a hard cut when the first sentence is already too long.
 */
export function truncateAtSentence(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const end = lastSentenceEnd(text, maxLength);
  return text.slice(0, end > 0 ? end : maxLength);
}

/**
 * @returns '' when there are no results
 */
export function assembleContext(results: ScoredChunk[], maxContextLength: number): string {
  return results
    .map((result) => {
      const content = truncateAtSentence(result.chunk.content.trim(), maxContextLength);
      return `[${result.sourceLabel}]\n${content}`;
    })
    .join(CONTEXT_SEPARATOR);
}
