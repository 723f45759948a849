/**
 * Command services tests
 */

import { describe, it, expect, vi } from 'vitest';
import { loggerFor } from '../services.js';
import type { CommandContext } from '../types.js';

describe('loggerFor', () => {
  it('routes warnings to ctx.warn and everything else to ctx.debug', () => {
    const ctx: CommandContext = {
      options: { verbose: true, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = loggerFor(ctx);

    logger.warn('usage log not writable');
    logger.info?.('Stored guide.txt as document 1 (5 chunks)');
    logger.debug?.('RAG request: received -> embedding');

    expect(ctx.warn).toHaveBeenCalledWith('usage log not writable');
    expect(ctx.debug).toHaveBeenNthCalledWith(1, 'Stored guide.txt as document 1 (5 chunks)');
    expect(ctx.debug).toHaveBeenNthCalledWith(2, 'RAG request: received -> embedding');
    expect(ctx.log).not.toHaveBeenCalled();
  });
});
