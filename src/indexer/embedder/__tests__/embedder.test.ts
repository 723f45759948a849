/**
 * Embedder Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { embedChunks } from '../embedder.js';
import { EmbeddingClient } from '../client.js';
import type { ChunkDescriptor } from '../../chunker/types.js';
import { ProviderError } from '../../../errors/index.js';
import { KeywordEmbeddingProvider, WordTokenizer } from '../../../test-utils/index.js';
import type { EmbeddingProvider } from '../../../providers/types.js';

function chunk(index: number, content: string): ChunkDescriptor {
  return { index, content, tokenCount: 1, startChar: index * 10, endChar: index * 10 + content.length };
}

function clientFor(provider: EmbeddingProvider): EmbeddingClient {
  return new EmbeddingClient({
    provider,
    tokenizer: new WordTokenizer(),
    model: 'test-embed',
    timeoutMs: 1000,
    pricing: { prices: {}, defaultPricePer1k: 0 },
  });
}

const chunks = ['red', 'green', 'blue', 'red green', 'blue blue'].map((text, i) => chunk(i, text));

describe('embedChunks', () => {
  it('embeds in batches and keeps chunk order', async () => {
    const provider = new KeywordEmbeddingProvider(['red', 'green', 'blue']);

    const embedded = await embedChunks(chunks, clientFor(provider), { batchSize: 2 });

    expect(provider.calls).toEqual([['red', 'green'], ['blue', 'red green'], ['blue blue']]);
    expect(embedded.map((c) => c.index)).toEqual([0, 1, 2, 3, 4]);
    expect(embedded[3].embedding).toBeInstanceOf(Float32Array);
    expect(Array.from(embedded[4].embedding)).toEqual([0, 0, 2]);
    expect(embedded[4]).toMatchObject({ content: 'blue blue', startChar: 40, endChar: 49 });
  });

  it('reports progress after each batch', async () => {
    const onProgress = vi.fn();
    const provider = new KeywordEmbeddingProvider(['red']);

    await embedChunks(chunks, clientFor(provider), { batchSize: 2, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it('fails as a whole when any batch fails', async () => {
    const embed = vi
      .fn<EmbeddingProvider['embed']>()
      .mockResolvedValueOnce({ vectors: [[1], [2]] })
      .mockRejectedValueOnce(new ProviderError('rate limited', { status: 429 }));

    await expect(
      embedChunks(chunks, clientFor({ name: 'mock', embed }), { batchSize: 2 })
    ).rejects.toThrow('rate limited');
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it('returns nothing for no chunks', async () => {
    const provider = new KeywordEmbeddingProvider(['red']);

    await expect(embedChunks([], clientFor(provider))).resolves.toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });
});
