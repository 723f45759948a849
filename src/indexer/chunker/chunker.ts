/**
 * Token-bounded document chunker
 *
 * Splits a document into chunks that:
 * - never exceed maxTokensPerChunk tokens
 * - break between sentences wherever a sentence fits
 * - repeat up to overlapTokens tokens of the previous chunk's tail
 * - cover the text from offset 0 to text.length without gaps
 *
 * Chunks are yielded lazily in a single pass. The function is pure, so
 * chunking the same text with the same options yields the same chunks.
 */

import { ValidationError } from '../../errors/index.js';
import type { Tokenizer } from '../../tokenizer/index.js';
import { DEFAULT_CHUNK_OPTIONS, validateChunkOptions } from './config.js';
import { splitSentences } from './sentences.js';
import type { ChunkDescriptor, ChunkOptions, TextSpan } from './types.js';

/** A sentence, or a slice of an oversized one, with its token count */
interface Piece extends TextSpan {
  tokens: number;
}

/** Start of the carried-over tail of the previous chunk */
interface Seed {
  start: number;
  tokens: number;
}

// ============================================================================
// Pieces
// ============================================================================

/**
 * Cut an oversized sentence at token boundaries.
 *
 * Each piece is a token prefix of what is left, decoded back to text. A
 * prefix only counts when it decodes to the exact characters at that
 * position; byte-level tokens can end inside a multi-byte character, and
 * those prefixes are skipped.
 */
function forceSplit(text: string, span: TextSpan, tokenizer: Tokenizer, maxTokens: number): Piece[] {
  const pieces: Piece[] = [];
  let offset = span.start;
  let ids = tokenizer.encode(text.slice(offset, span.end));
  let cursor = 0;

  while (offset < span.end) {
    if (cursor >= ids.length) {
      ids = tokenizer.encode(text.slice(offset, span.end));
      cursor = 0;
    }

    let part = '';
    let taken = Math.min(maxTokens, ids.length - cursor);
    for (; taken > 0; taken--) {
      part = tokenizer.decode(ids.slice(cursor, cursor + taken));
      if (part.length > 0 && text.startsWith(part, offset) && tokenizer.count(part) <= maxTokens) {
        break;
      }
    }

    if (taken === 0) {
      // No aligned prefix: emit one character and re-encode from after it
      part = String.fromCodePoint(text.codePointAt(offset) ?? 0);
      ids = [];
      cursor = 0;
    } else {
      cursor += taken;
    }

    pieces.push({ start: offset, end: offset + part.length, tokens: tokenizer.count(part) });
    offset += part.length;
  }

  return pieces;
}

function splitIntoPieces(text: string, tokenizer: Tokenizer, maxTokens: number): Piece[] {
  const pieces: Piece[] = [];

  for (const span of splitSentences(text)) {
    const tokens = tokenizer.count(text.slice(span.start, span.end));
    if (tokens <= maxTokens) {
      pieces.push({ ...span, tokens });
    } else {
      pieces.push(...forceSplit(text, span, tokenizer, maxTokens));
    }
  }

  return pieces;
}

// ============================================================================
// Overlap
// ============================================================================

/**
 * Where the next chunk starts when it carries up to `budget` tokens from
 * the end of `previous`. The tail is decoded from the previous chunk's
 * own tokens and must match its text exactly; otherwise fewer tokens are
 * tried.
 */
function overlapSeed(previous: ChunkDescriptor, tokenizer: Tokenizer, budget: number): Seed | null {
  const limit = Math.min(budget, previous.tokenCount);
  if (limit <= 0) return null;

  const ids = tokenizer.encode(previous.content);
  for (let n = Math.min(limit, ids.length); n > 0; n--) {
    const tail = tokenizer.decode(ids.slice(ids.length - n));
    if (tail.length > 0 && previous.content.endsWith(tail)) {
      return { start: previous.endChar - tail.length, tokens: n };
    }
  }

  return null;
}

// ============================================================================
// Chunking
// ============================================================================

function* generateChunks(
  text: string,
  tokenizer: Tokenizer,
  options: ChunkOptions
): Generator<ChunkDescriptor, void, undefined> {
  const { maxTokensPerChunk: maxTokens, overlapTokens } = options;
  const pieces = splitIntoPieces(text, tokenizer, maxTokens);

  let previous: ChunkDescriptor | null = null;
  let next = 0;
  let index = 0;

  while (next < pieces.length) {
    const first = pieces[next];
    next++;

    // Overlap never takes room the chunk's first piece needs
    const seed = previous
      ? overlapSeed(previous, tokenizer, Math.min(overlapTokens, maxTokens - first.tokens))
      : null;

    const draft: Piece[] = [first];
    let estimate = first.tokens + (seed?.tokens ?? 0);
    while (next < pieces.length && estimate + pieces[next].tokens <= maxTokens) {
      estimate += pieces[next].tokens;
      draft.push(pieces[next]);
      next++;
    }

    // Token counts are not additive across piece boundaries, so the sum
    // is only an estimate. Settle on the exact count: hand trailing
    // pieces back first, then drop the overlap. A lone piece can still be
    // over the limit when one character encodes to more tokens than that.
    let start = seed?.start ?? first.start;
    for (;;) {
      const end = draft[draft.length - 1].end;
      const content = text.slice(start, end);
      const tokenCount = tokenizer.count(content);

      if (tokenCount <= maxTokens) {
        const chunk: ChunkDescriptor = { index, content, tokenCount, startChar: start, endChar: end };
        yield chunk;
        previous = chunk;
        index++;
        break;
      }

      if (draft.length > 1) {
        draft.pop();
        next--;
      } else if (start !== first.start) {
        start = first.start;
      } else {
        throw new ValidationError(`Text at offset ${start} does not fit in one chunk`, [
          `"${content}" encodes to ${tokenCount} tokens; maxTokensPerChunk is ${maxTokens}`,
        ]);
      }
    }
  }
}

/**
 * Lazily chunk a document.
 *
 * Options are validated before the first chunk is requested. Empty or
 * whitespace-only text yields nothing.
 *
 * @throws ValidationError when the options are invalid; while iterating,
 *   when a single character needs more tokens than maxTokensPerChunk
 */
export function chunkText(
  text: string,
  tokenizer: Tokenizer,
  options: ChunkOptions = DEFAULT_CHUNK_OPTIONS
): Generator<ChunkDescriptor, void, undefined> {
  validateChunkOptions(options);
  if (text.trim().length === 0) {
    return generateChunks('', tokenizer, options);
  }
  return generateChunks(text, tokenizer, options);
}

/**
 * Chunk a whole document at once.
 */
export function chunkDocument(
  text: string,
  tokenizer: Tokenizer,
  options: ChunkOptions = DEFAULT_CHUNK_OPTIONS
): ChunkDescriptor[] {
  return Array.from(chunkText(text, tokenizer, options));
}
