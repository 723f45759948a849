/**
 * Command services
 *
 * Commands reach the knowledge base through here, so tests can swap it
 * for a stub with vi.mock.
 */

import { loadConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { createKnowledgeBase, type KnowledgeBase } from '../knowledge-base.js';
import type { Logger } from '../utils/logger.js';
import type { CommandContext } from './types.js';

/**
 * Library components log through the command context.
 */
export function loggerFor(ctx: CommandContext): Logger {
  return {
    warn: ctx.warn,
    info: ctx.debug,
    debug: ctx.debug,
  };
}

export function openKnowledgeBase(ctx: CommandContext, config: Config = loadConfig()): KnowledgeBase {
  return createKnowledgeBase(config, {
    logger: loggerFor(ctx),
    onStateChange: (next, previous) => ctx.debug(`${previous} -> ${next}`),
  });
}
