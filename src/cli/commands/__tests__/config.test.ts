/**
 * Tests for config command
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { createConfigCommand, formatConfigValue, reingestNotice } from '../config.js';
import { getConfigValue } from '../../../config/loader.js';
import { DEFAULT_USER_PROMPT_TEMPLATE } from '../../../config/defaults.js';
import { _clearEnvCache } from '../../../config/env.js';
import { createMockContext, printedJSON, run, type MockContext } from './helpers.js';

const ENV_KEYS = ['DOCQA_HOME', 'DOCQA_SYSTEM_PROMPT', 'DOCQA_USER_PROMPT_TEMPLATE'] as const;

describe('formatConfigValue', () => {
  it('escapes newlines in prompts', () => {
    expect(formatConfigValue('Context:\n{context}')).toBe('"Context:\\n{context}"');
    expect(formatConfigValue(200)).toBe('200');
    expect(formatConfigValue({ 'text-embedding-3-small': 0.00002 })).toBe('{"text-embedding-3-small":0.00002}');
  });
});

describe('reingestNotice', () => {
  it('only speaks up for settings baked into stored chunks', () => {
    expect(reingestNotice('chunking.max_tokens_per_chunk')).toContain('--replace');
    expect(reingestNotice('embedding.model')).toContain('re-ingest every document');
    expect(reingestNotice('search.default_top_k')).toBeUndefined();
  });
});

describe('createConfigCommand', () => {
  const saved = new Map<string, string | undefined>();
  let mock: MockContext;
  let home: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    chalk.level = 0;
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-config-cmd-'));
    process.env['DOCQA_HOME'] = home;
    _clearEnvCache();
    mock = createMockContext();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    _clearEnvCache();
    fs.rmSync(home, { recursive: true, force: true });
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  describe('list', () => {
    it('shows one section with what each key does', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'list', 'chunking']);

      expect(mock.logOutput).toEqual([
        '[chunking]',
        '  max_tokens_per_chunk = 8000',
        '    Upper bound on tokens per chunk',
        '  overlap_tokens = 200',
        '    Tokens repeated from the end of one chunk at the start of the next',
        '',
        `Config file: ${path.join(home, 'config.toml')}`,
      ]);
    });

    it('rejects an unknown section', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'list', 'retrieval']);

      expect(mock.errors).toEqual(['Unknown config key: retrieval']);
      expect(mock.logOutput).toEqual(['Sections: embedding, chunking, search, generation, storage']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('get', () => {
    it('prints the value', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'get', 'chunking.overlap_tokens']);

      expect(mock.logOutput).toEqual(['200']);
    });

    it('suggests the keys of the same section', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'get', 'chunking.overlap']);

      expect(mock.errors).toEqual(['Unknown config key: chunking.overlap']);
      expect(mock.logOutput).toEqual(['Keys in chunking: max_tokens_per_chunk, overlap_tokens']);
      expect(process.exitCode).toBe(1);
    });

    it('prints the value and its description as JSON', async () => {
      mock = createMockContext(true);

      await run(createConfigCommand(() => mock.ctx), ['config', 'get', 'search.default_top_k']);

      expect(printedJSON(consoleLogSpy)).toEqual({
        key: 'search.default_top_k',
        value: 3,
        description: 'Chunks retrieved per query',
      });
    });
  });

  describe('set', () => {
    it('writes a chunking value and says stored documents keep their chunks', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'set', 'chunking.overlap_tokens', '50']);

      expect(mock.logOutput).toEqual([
        '✓ Set chunking.overlap_tokens = 50',
        'Stored documents keep their chunks until re-ingested: docqa ingest <file> --replace <id>',
      ]);
      expect(getConfigValue('chunking.overlap_tokens')).toBe(50);
    });

    it('refuses a prompt template without {query}', async () => {
      await run(createConfigCommand(() => mock.ctx), [
        'config',
        'set',
        'generation.user_prompt_template',
        'Context: {context}',
      ]);

      expect(mock.errors).toEqual(['User prompt template is missing required placeholders']);
      expect(mock.logOutput).toEqual(['Issues:\n  generation.user_prompt_template: add {query}']);
      expect(getConfigValue('generation.user_prompt_template')).toBe(DEFAULT_USER_PROMPT_TEMPLATE);
      expect(process.exitCode).toBe(1);
    });

    it('refuses overlap that is not below the chunk size', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'set', 'chunking.overlap_tokens', '8000']);

      expect(mock.errors[0]).toMatch(/^Invalid value for 'chunking\.overlap_tokens'/);
      expect(getConfigValue('chunking.overlap_tokens')).toBe(200);
    });

    it('does not write keys outside the schema', async () => {
      await run(createConfigCommand(() => mock.ctx), ['config', 'set', 'search.top_k', '5']);

      expect(mock.errors).toEqual(['Unknown config key: search.top_k']);
      expect(mock.logOutput).toEqual(['Keys in search: default_top_k, max_context_length']);
      expect(fs.existsSync(path.join(home, 'config.toml'))).toBe(true);
      expect(fs.readFileSync(path.join(home, 'config.toml'), 'utf-8')).not.toContain('top_k = 5');
    });

    it('accepts a price for a new model', async () => {
      await run(createConfigCommand(() => mock.ctx), [
        'config',
        'set',
        'embedding.pricing.custom-embed',
        '0.5',
      ]);

      expect(mock.errors).toEqual([]);
      expect(getConfigValue('embedding.pricing.custom-embed')).toBe(0.5);
    });
  });
});
