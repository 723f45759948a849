/**
 * OpenAI provider tests, against stubbed SDK surfaces.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import OpenAI from 'openai';
import {
  OpenAIEmbeddingProvider,
  OpenAIGenerationProvider,
  createOpenAIClient,
  toProviderError,
} from '../openai.js';
import { _clearEnvCache } from '../../config/env.js';
import {
  APIKeyError,
  ProviderError,
  TimeoutError,
  ValidationError,
} from '../../errors/index.js';

describe('createOpenAIClient', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('throws APIKeyError without a key', () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    expect(() => createOpenAIClient()).toThrow(APIKeyError);
  });

  it('builds a client when a key is given', () => {
    expect(createOpenAIClient({ apiKey: 'test-secret' })).toBeInstanceOf(OpenAI);
  });
});

describe('toProviderError', () => {
  it('keeps docqa errors as they are', () => {
    const error = new ValidationError('bad');

    expect(toProviderError(error, 'Embedding request')).toBe(error);
  });

  it('maps SDK timeouts to TimeoutError', () => {
    const error = toProviderError(
      new OpenAI.APIConnectionTimeoutError(),
      'Embedding request',
      3000
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('Embedding request timed out after 3000ms');
  });

  it('maps API errors to ProviderError with the status', () => {
    const apiError = new OpenAI.APIError(401, { message: 'Incorrect API key' }, undefined, undefined);
    const error = toProviderError(apiError, 'Generation request');

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ status: 401, cause: apiError });
  });

  it('wraps anything else as ProviderError', () => {
    const error = toProviderError(new Error('socket hang up'), 'Embedding request');

    expect(error).toBeInstanceOf(ProviderError);
    expect(error.message).toBe('Embedding request failed: socket hang up');
  });
});

describe('OpenAIEmbeddingProvider', () => {
  it('returns vectors in input order', async () => {
    const create = vi.fn().mockResolvedValue({
      data: [
        { embedding: [0, 1], index: 1 },
        { embedding: [1, 0], index: 0 },
      ],
      usage: { prompt_tokens: 7 },
    });
    const provider = new OpenAIEmbeddingProvider({ create });

    const result = await provider.embed(['first', 'second'], 'text-embedding-3-small');

    expect(result).toEqual({ vectors: [[1, 0], [0, 1]], usage: { promptTokens: 7 } });
    expect(create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: ['first', 'second'] },
      { signal: undefined }
    );
  });

  it('passes the abort signal through', async () => {
    const create = vi.fn().mockResolvedValue({ data: [] });
    const controller = new AbortController();

    await new OpenAIEmbeddingProvider({ create }).embed(['x'], 'm', { signal: controller.signal });

    expect(create.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
  });

  it('surfaces SDK failures as ProviderError', async () => {
    const create = vi.fn().mockRejectedValue(new Error('ECONNRESET'));

    await expect(new OpenAIEmbeddingProvider({ create }).embed(['x'], 'm')).rejects.toThrow(
      ProviderError
    );
  });
});

describe('OpenAIGenerationProvider', () => {
  const request = {
    systemPrompt: 'Answer from context.',
    userPrompt: 'Context: none\nQuestion: hi',
    model: 'gpt-4o',
    temperature: 0.2,
    maxTokens: 1000,
  };

  it('sends system and user messages and returns the answer', async () => {
    const create = vi.fn().mockResolvedValue({
      model: 'gpt-4o-2024-08-06',
      choices: [{ message: { content: '  Hello there.  ' } }],
      usage: { prompt_tokens: 20, completion_tokens: 3 },
    });

    const result = await new OpenAIGenerationProvider({ create }).generate(request);

    expect(result).toEqual({
      text: 'Hello there.',
      model: 'gpt-4o-2024-08-06',
      usage: { promptTokens: 20, completionTokens: 3 },
    });
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o',
        messages: [
          { role: 'system', content: 'Answer from context.' },
          { role: 'user', content: 'Context: none\nQuestion: hi' },
        ],
        temperature: 0.2,
        max_tokens: 1000,
      },
      { signal: undefined }
    );
  });

  it('treats an empty answer as a provider failure', async () => {
    const create = vi.fn().mockResolvedValue({
      model: 'gpt-4o',
      choices: [{ message: { content: null } }],
    });

    await expect(new OpenAIGenerationProvider({ create }).generate(request)).rejects.toThrow(
      'Generation request returned an empty answer'
    );
  });

  it('reports aborted requests as timeouts', async () => {
    const create = vi.fn().mockRejectedValue(new OpenAI.APIUserAbortError());

    await expect(
      new OpenAIGenerationProvider({ create }, 60000).generate(request)
    ).rejects.toBeInstanceOf(TimeoutError);
  });
});
