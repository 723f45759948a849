import { describe, it, expect } from 'vitest';
import { TiktokenTokenizer, createTokenizer, encodingForModelName } from '../tokenizer.js';

describe('encodingForModelName', () => {
  it('maps known models to their encoding', () => {
    expect(encodingForModelName('text-embedding-3-small')).toBe('cl100k_base');
    expect(encodingForModelName('gpt-4o')).toBe('o200k_base');
  });

  it('falls back to cl100k_base for unknown models', () => {
    expect(encodingForModelName('my-local-model')).toBe('cl100k_base');
    expect(createTokenizer('my-local-model').name).toBe('cl100k_base');
  });
});

describe('TiktokenTokenizer', () => {
  const tokenizer = new TiktokenTokenizer();

  it('round-trips text through encode and decode', () => {
    const text = 'Machine Learning is a subset of AI. Café, naïve, 東京 🚀!';

    expect(tokenizer.decode(tokenizer.encode(text))).toBe(text);
  });

  it('counts tokens deterministically', () => {
    const text = 'Deep learning uses neural networks with many layers.';

    expect(tokenizer.count(text)).toBe(tokenizer.encode(text).length);
    expect(tokenizer.count(text)).toBe(tokenizer.count(text));
    expect(tokenizer.count(text)).toBeGreaterThan(5);
  });

  it('returns zero tokens for empty text', () => {
    expect(tokenizer.count('')).toBe(0);
    expect(tokenizer.decode([])).toBe('');
  });

  it('encodes special-token markup as plain text', () => {
    const text = 'before <|endoftext|> after';

    expect(tokenizer.decode(tokenizer.encode(text))).toBe(text);
  });
});
