/**
 * Subword tokenizer used to measure and cut chunk text.
 *
 * Backed by js-tiktoken's BPE encodings. Model names map to their
 * encoding; anything unknown falls back to cl100k_base.
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';

/**
 * What the chunker and the embedding client need from a tokenizer.
 * decode(encode(text)) must return text unchanged.
 */
export interface Tokenizer {
  /** Encoding name, for diagnostics */
  readonly name: string;
  count(text: string): number;
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

const MODEL_ENCODINGS: Record<string, TiktokenEncoding> = {
  'text-embedding-3-small': 'cl100k_base',
  'text-embedding-3-large': 'cl100k_base',
  'text-embedding-ada-002': 'cl100k_base',
  'gpt-4': 'cl100k_base',
  'gpt-4-turbo': 'cl100k_base',
  'gpt-3.5-turbo': 'cl100k_base',
  'gpt-4o': 'o200k_base',
  'gpt-4o-mini': 'o200k_base',
};

/**
 * Encoding for a model name, or the default for models we don't know.
 */
export function encodingForModelName(model: string): TiktokenEncoding {
  return MODEL_ENCODINGS[model] ?? DEFAULT_ENCODING;
}

// Rank tables are large; build each encoding once per process
const encodings = new Map<TiktokenEncoding, Tiktoken>();

function loadEncoding(name: TiktokenEncoding): Tiktoken {
  let encoding = encodings.get(name);
  if (!encoding) {
    encoding = getEncoding(name);
    encodings.set(name, encoding);
  }
  return encoding;
}

export class TiktokenTokenizer implements Tokenizer {
  readonly name: TiktokenEncoding;
  private readonly encoding: Tiktoken;

  constructor(encoding: TiktokenEncoding = DEFAULT_ENCODING) {
    this.name = encoding;
    this.encoding = loadEncoding(encoding);
  }

  count(text: string): number {
    return this.encode(text).length;
  }

  encode(text: string): number[] {
    if (text.length === 0) return [];
    // Special-token markup in documents is ordinary text here
    return this.encoding.encode(text, [], []);
  }

  decode(tokens: number[]): string {
    if (tokens.length === 0) return '';
    return this.encoding.decode(tokens);
  }
}

/**
 * Tokenizer matching the given model's encoding.
 */
export function createTokenizer(model?: string): Tokenizer {
  return new TiktokenTokenizer(model ? encodingForModelName(model) : DEFAULT_ENCODING);
}
