/**
 * Ask Command
 *
 * Answers a question from the stored documents:
 *
 *   docqa ask "What is machine learning?"
 *   docqa ask "How do neural networks learn?" --top 5 --json
 *
 * A failed question prints its failure kind and exits non-zero with the
 * code of that kind; nothing is retried.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import type { RAGAnswer, RAGFailure } from '../../agent/types.js';
import type { FailureKind } from '../../errors/index.js';
import { formatScore } from '../../search/formatter.js';
import { openKnowledgeBase } from '../services.js';
import { parseInput, QuerySchema, TopKOptionsSchema } from '../validation.js';

interface AskCommandOptions {
  top?: string;
}

/** Same codes the matching error classes exit with */
export const FAILURE_EXIT_CODES: Record<FailureKind, number> = {
  validation: 1,
  storage: 5,
  provider: 6,
  timeout: 7,
};

function printAnswer(ctx: CommandContext, result: RAGAnswer): void {
  ctx.log(result.answer);
  ctx.log('');

  if (!result.contextFound) {
    ctx.log(chalk.yellow('No relevant context found; the answer is not grounded in stored documents.'));
    return;
  }

  ctx.log(chalk.dim('Sources:'));
  result.sources.forEach((source, i) => {
    ctx.log(
      `  ${chalk.cyan(`[${i + 1}]`)} ${source.filename} (chunk ${source.chunkIndex}) ${chalk.dim(formatScore(source.similarity))}`
    );
  });
  ctx.log('');
  ctx.log(
    chalk.dim(
      `Relevance: ${result.relevanceScore?.toFixed(3) ?? 'n/a'} (${result.quality ?? 'n/a'}) · Model: ${result.modelUsed}`
    )
  );
}

function printFailure(ctx: CommandContext, failure: RAGFailure): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(failure, null, 2));
  } else {
    ctx.error(`${failure.error.kind} failure while ${failure.state}: ${failure.error.message}`);
  }
  process.exitCode = FAILURE_EXIT_CODES[failure.error.kind];
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer from the stored documents')
    .description('Answer a question using the stored documents as context')
    .option('-k, --top <n>', 'Chunks to use as context (default: search.default_top_k)')
    .action(async (rawQuestion: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const question = parseInput(QuerySchema, rawQuestion);
      const { top } = parseInput(TopKOptionsSchema, { top: cmdOptions.top });
      ctx.debug(`Question: "${question}" (top ${top ?? 'default'})`);

      const kb = openKnowledgeBase(ctx);
      try {
        const result = await kb.answer(question, top);

        if (!result.success) {
          printFailure(ctx, result);
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ question, ...result }, null, 2));
          return;
        }
        printAnswer(ctx, result);
      } finally {
        kb.close();
      }
    });
}
