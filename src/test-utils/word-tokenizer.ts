/**
 * Deterministic stand-in for the BPE tokenizer.
 *
 * Every token is a run of non-whitespace plus the whitespace after it
 * ("four. " is one token). Leading whitespace is a token of its own.
 * Token ids come from a per-instance vocabulary, so decode(encode(s)) === s.
 */

import type { Tokenizer } from '../tokenizer/index.js';

const TOKEN_PATTERN = /\S+\s*|\s+/g;

export class WordTokenizer implements Tokenizer {
  readonly name = 'words';
  private readonly ids = new Map<string, number>();
  private readonly pieces: string[] = [];

  count(text: string): number {
    return text.match(TOKEN_PATTERN)?.length ?? 0;
  }

  encode(text: string): number[] {
    return (text.match(TOKEN_PATTERN) ?? []).map((piece) => {
      let id = this.ids.get(piece);
      if (id === undefined) {
        id = this.pieces.length;
        this.pieces.push(piece);
        this.ids.set(piece, id);
      }
      return id;
    });
  }

  decode(tokens: number[]): string {
    return tokens.map((id) => this.pieces[id] ?? '').join('');
  }
}
