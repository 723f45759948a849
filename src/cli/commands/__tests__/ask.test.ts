/**
 * Tests for ask command
 *
 * Real knowledge base over in-memory SQLite; the generation provider
 * answers with a fixed text.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAskCommand, FAILURE_EXIT_CODES } from '../ask.js';
import { ProviderError, ValidationError } from '../../../errors/index.js';
import { AI_GUIDE, type TestKnowledgeBase } from '../../../test-utils/index.js';
import { createMockContext, printedJSON, run, useTestKnowledgeBase, type MockContext } from './helpers.js';

vi.mock('../../services.js', () => ({
  openKnowledgeBase: vi.fn(),
}));

const ANSWER = 'Machine learning is a subset of AI that learns from data.';

describe('createAskCommand', () => {
  let mock: MockContext;
  let t: TestKnowledgeBase;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    mock = createMockContext();
    t = useTestKnowledgeBase(ANSWER);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    t.db.close();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints the answer with its sources', async () => {
    await t.kb.documents.upload('guide.txt', Buffer.from(AI_GUIDE));

    await run(createAskCommand(() => mock.ctx), ['ask', 'What is machine learning?']);

    expect(mock.logOutput).toEqual([
      ANSWER,
      '',
      'Sources:',
      '  [1] guide.txt (chunk 1) 0.98',
      '  [2] guide.txt (chunk 2) 0.24',
      '  [3] guide.txt (chunk 0) 0.00',
      '',
      'Relevance: 0.683 (Fair) · Model: gpt-4o',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('passes --top through to retrieval', async () => {
    await t.kb.documents.upload('guide.txt', Buffer.from(AI_GUIDE));

    await run(createAskCommand(() => mock.ctx), ['ask', 'What is machine learning?', '-k', '1']);

    expect(mock.logOutput).toContain('  [1] guide.txt (chunk 1) 0.98');
    expect(mock.logOutput).not.toContain('  [2] guide.txt (chunk 2) 0.24');
  });

  it('says when the answer has no context', async () => {
    await run(createAskCommand(() => mock.ctx), ['ask', 'What is machine learning?']);

    expect(mock.logOutput[2]).toBe(
      'No relevant context found; the answer is not grounded in stored documents.'
    );
  });

  it('prints the result as JSON', async () => {
    mock = createMockContext(true);
    await t.kb.documents.upload('guide.txt', Buffer.from(AI_GUIDE));

    await run(createAskCommand(() => mock.ctx), ['ask', 'What is machine learning?', '--top', '1']);

    expect(printedJSON(consoleLogSpy)).toMatchObject({
      question: 'What is machine learning?',
      success: true,
      answer: ANSWER,
      contextFound: true,
      modelUsed: 'gpt-4o',
      sources: [{ filename: 'guide.txt', chunkIndex: 1 }],
    });
  });

  it('reports a provider failure with exit code 6', async () => {
    await t.kb.documents.upload('guide.txt', Buffer.from(AI_GUIDE));
    vi.spyOn(t.generator, 'generate').mockRejectedValue(new ProviderError('Rate limit exceeded', { status: 429 }));

    await run(createAskCommand(() => mock.ctx), ['ask', 'What is machine learning?']);

    expect(mock.errors).toEqual(['provider failure while generating: Rate limit exceeded']);
    expect(process.exitCode).toBe(6);
  });

  it('reports an embedding failure as a provider failure while embedding', async () => {
    vi.spyOn(t.embeddings, 'embed').mockRejectedValue(new Error('socket hang up'));

    await run(createAskCommand(() => mock.ctx), ['ask', 'What is machine learning?']);

    expect(mock.errors).toEqual(['provider failure while embedding: keyword embedding request failed']);
    expect(process.exitCode).toBe(FAILURE_EXIT_CODES.provider);
  });

  it('rejects a blank question before asking', async () => {
    await expect(run(createAskCommand(() => mock.ctx), ['ask', ' '])).rejects.toThrow(ValidationError);
    expect(t.generator.requests).toHaveLength(0);
  });
});
