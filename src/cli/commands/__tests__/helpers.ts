/**
 * Shared setup for command tests
 */

import { vi } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../../types.js';
import { openKnowledgeBase } from '../../services.js';
import { createTestKnowledgeBase, type TestKnowledgeBase } from '../../../test-utils/index.js';

export interface MockContext {
  ctx: CommandContext;
  logOutput: string[];
  errors: string[];
  warnings: string[];
}

export function createMockContext(json = false): MockContext {
  const logOutput: string[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];
  return {
    logOutput,
    errors,
    warnings,
    ctx: {
      options: { verbose: false, json },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: (msg: string) => warnings.push(msg),
      error: (msg: string) => errors.push(msg),
    },
  };
}

/**
 * Point the mocked openKnowledgeBase at an in-memory knowledge base.
 * The command's close() is ignored so tests can inspect the database after.
 */
export function useTestKnowledgeBase(answer?: string): TestKnowledgeBase {
  chalk.level = 0;
  const t = createTestKnowledgeBase(answer);
  vi.spyOn(t.kb, 'close').mockImplementation(() => {});
  vi.mocked(openKnowledgeBase).mockReturnValue(t.kb);
  return t;
}

export async function run(command: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  program.addCommand(command);
  await program.parseAsync(['node', 'test', ...args]);
}

/** JSON printed with console.log, parsed */
export function printedJSON(spy: { mock: { calls: unknown[][] } }): unknown {
  const [first] = spy.mock.calls;
  return JSON.parse(String(first?.[0]));
}
