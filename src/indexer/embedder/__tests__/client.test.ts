/**
 * Embedding Client Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { EmbeddingClient, createEmbeddingClient } from '../client.js';
import type { UsageRecord, UsageSink } from '../types.js';
import type { EmbeddingProvider } from '../../../providers/types.js';
import { ProviderError, TimeoutError, ValidationError } from '../../../errors/index.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { KeywordEmbeddingProvider, WordTokenizer } from '../../../test-utils/index.js';

const PRICING = { prices: { 'test-embed': 0.02 }, defaultPricePer1k: 0.1 };

function recordingSink(): UsageSink & { records: UsageRecord[] } {
  const records: UsageRecord[] = [];
  return { records, record: (usage) => records.push(usage) };
}

function createClient(overrides: Partial<ConstructorParameters<typeof EmbeddingClient>[0]> = {}) {
  return new EmbeddingClient({
    provider: new KeywordEmbeddingProvider(['alpha', 'beta', 'gamma']),
    tokenizer: new WordTokenizer(),
    model: 'test-embed',
    timeoutMs: 1000,
    pricing: PRICING,
    ...overrides,
  });
}

describe('EmbeddingClient', () => {
  describe('embedOne', () => {
    it('returns the vector for the text', async () => {
      const client = createClient();

      await expect(client.embedOne('alpha gamma gamma')).resolves.toEqual([1, 0, 2]);
    });

    it('passes the model and an abort signal to the provider', async () => {
      const embed = vi.fn<EmbeddingProvider['embed']>().mockResolvedValue({ vectors: [[1, 2]] });
      const client = createClient({ provider: { name: 'mock', embed } });

      await client.embedOne('hello');

      expect(embed).toHaveBeenCalledWith(['hello'], 'test-embed', {
        signal: expect.any(AbortSignal),
      });
    });

    it('rejects empty text without calling the provider', async () => {
      const provider = new KeywordEmbeddingProvider(['alpha']);
      const client = createClient({ provider });

      await expect(client.embedOne('   ')).rejects.toThrow(ValidationError);
      expect(provider.calls).toHaveLength(0);
    });
  });

  describe('embedBatch', () => {
    it('returns one vector per text in input order with a single request', async () => {
      const provider = new KeywordEmbeddingProvider(['alpha', 'beta']);
      const client = createClient({ provider });

      const vectors = await client.embedBatch(['beta', 'alpha', 'alpha beta']);

      expect(vectors).toEqual([
        [0, 1],
        [1, 0],
        [1, 1],
      ]);
      expect(provider.calls).toEqual([['beta', 'alpha', 'alpha beta']]);
    });

    it('makes no request for an empty list', async () => {
      const provider = new KeywordEmbeddingProvider(['alpha']);
      const client = createClient({ provider });

      await expect(client.embedBatch([])).resolves.toEqual([]);
      expect(provider.calls).toHaveLength(0);
    });

    it('names every empty text in the validation error', async () => {
      const client = createClient();

      await expect(client.embedBatch(['alpha', '', ' '])).rejects.toMatchObject({
        issues: ['texts[1] is empty', 'texts[2] is empty'],
      });
    });

    it('fails the whole batch when the provider fails', async () => {
      const cause = new Error('socket hang up');
      const client = createClient({
        provider: { name: 'flaky', embed: vi.fn().mockRejectedValue(cause) },
      });

      const error = await client.embedBatch(['alpha', 'beta']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ message: 'flaky embedding request failed', cause });
    });

    it('passes provider errors through unchanged', async () => {
      const failure = new ProviderError('OpenAI embedding request failed', { status: 429 });
      const client = createClient({
        provider: { name: 'openai', embed: vi.fn().mockRejectedValue(failure) },
      });

      await expect(client.embedBatch(['alpha'])).rejects.toBe(failure);
    });

    it('rejects a response with the wrong number of vectors', async () => {
      const client = createClient({
        provider: { name: 'short', embed: vi.fn().mockResolvedValue({ vectors: [[1]] }) },
      });

      await expect(client.embedBatch(['alpha', 'beta'])).rejects.toThrow(
        'Embedding provider returned 1 vectors for 2 inputs'
      );
    });

    it('rejects vectors of the wrong dimension', async () => {
      const client = createClient({ dimensions: 2 });

      await expect(client.embedBatch(['alpha'])).rejects.toThrow(
        'Embedding 0 has 3 dimensions, expected 2'
      );
    });

    it('times out with TimeoutError and aborts the request', async () => {
      let received: AbortSignal | undefined;
      const client = createClient({
        timeoutMs: 20,
        provider: {
          name: 'stalled',
          embed: (_texts, _model, options) => {
            received = options?.signal;
            return new Promise(() => {});
          },
        },
      });

      await expect(client.embedBatch(['alpha'])).rejects.toThrow(TimeoutError);
      expect(received?.aborted).toBe(true);
    });
  });

  describe('usage records', () => {
    it('records tokens, requests and cost after a batch', async () => {
      const sink = recordingSink();
      const client = createClient({ usageSink: sink });

      await client.embedBatch(['alpha beta', 'gamma']);

      expect(sink.records).toHaveLength(1);
      const [usage] = sink.records;
      expect(usage).toMatchObject({
        operation: 'batch_chunks',
        model: 'test-embed',
        tokens: 3,
        requests: 1,
      });
      expect(usage.cost).toBeCloseTo(0.00006, 10);
      expect(usage.elapsedMs).toBeGreaterThanOrEqual(0);
    });

    it('records single_text for embedOne', async () => {
      const sink = recordingSink();
      await createClient({ usageSink: sink }).embedOne('alpha');

      expect(sink.records[0].operation).toBe('single_text');
    });

    it('prices unknown models at the default price', async () => {
      const sink = recordingSink();
      await createClient({ usageSink: sink, model: 'other-model' }).embedBatch(['a b c d']);

      expect(sink.records[0].cost).toBeCloseTo(0.0004, 10);
    });

    it('records nothing when the request fails', async () => {
      const sink = recordingSink();
      const client = createClient({
        usageSink: sink,
        provider: { name: 'down', embed: vi.fn().mockRejectedValue(new Error('down')) },
      });

      await expect(client.embedOne('alpha')).rejects.toThrow();
      expect(sink.records).toHaveLength(0);
    });

    it('warns and still returns vectors when the sink throws', async () => {
      const warn = vi.fn();
      const client = createClient({
        logger: { warn },
        usageSink: {
          record: () => {
            throw new Error('disk full');
          },
        },
      });

      await expect(client.embedOne('beta')).resolves.toEqual([0, 1, 0]);
      expect(warn).toHaveBeenCalledWith('Could not write embedding usage log: disk full');
    });
  });
});

describe('createEmbeddingClient', () => {
  it('takes model, dimensions and pricing from the embedding config', async () => {
    const sink = recordingSink();
    const client = createEmbeddingClient(DEFAULT_CONFIG.embedding, {
      provider: { name: 'mock', embed: vi.fn().mockResolvedValue({ vectors: [[0.5]] }) },
      tokenizer: new WordTokenizer(),
      usageSink: sink,
    });

    expect(client.model).toBe('text-embedding-3-small');
    expect(client.dimensions).toBe(1536);
    await expect(client.embedOne('x')).rejects.toThrow('Embedding 0 has 1 dimensions, expected 1536');
  });
});
