/**
 * Sentence boundary detection.
 *
 * A punctuation heuristic, not a full sentence splitter: a sentence ends
 * after a run of . ! or ? (plus any closing quotes or brackets) that is
 * followed by whitespace, and at blank lines. Abbreviations such as "Dr."
 * therefore end a sentence too.
 *
 * The whitespace after a boundary belongs to the sentence before it, so
 * the spans tile the text exactly: no gaps, no overlaps.
 */

import type { TextSpan } from './types.js';

const BOUNDARY_PATTERN = /[.!?]+["'”’)\]]*\s+|\n[ \t]*\n\s*/g;

export function splitSentences(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let start = 0;

  for (const match of text.matchAll(BOUNDARY_PATTERN)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > start) {
      spans.push({ start, end });
      start = end;
    }
  }

  if (start < text.length) {
    spans.push({ start, end: text.length });
  }

  return spans;
}

/**
 * End offset of the last sentence in `text` that finishes at or before
 * `limit`, or 0 when none does. Trailing whitespace is not included.
 */
export function lastSentenceEnd(text: string, limit: number): number {
  let best = 0;
  for (const match of text.matchAll(/[.!?]+["'”’)\]]*(?=\s|$)/g)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > limit) break;
    best = end;
  }
  return best;
}
