/**
 * Search Command
 *
 * Ranks stored chunks by cosine similarity to a query:
 *
 *   docqa search "What is machine learning?"
 *   docqa search "neural networks" --top 5 --json
 *
 * An empty store, or one without embedded chunks, prints the explicit
 * "no relevant context" result rather than an empty list.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { formatOutcomeJSON, formatOutcomeSummary, formatResults } from '../../search/formatter.js';
import { openKnowledgeBase } from '../services.js';
import { parseInput, QuerySchema, TopKOptionsSchema } from '../validation.js';

interface SearchCommandOptions {
  top?: string;
  offsets?: boolean;
}

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query')
    .description('Find the stored chunks most similar to a query')
    .option('-k, --top <n>', 'Number of results (default: search.default_top_k)')
    .option('--offsets', 'Show character offsets of each chunk')
    .action(async (rawQuery: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();
      const query = parseInput(QuerySchema, rawQuery);
      const { top } = parseInput(TopKOptionsSchema, { top: cmdOptions.top });
      ctx.debug(`Searching for "${query}" (top ${top ?? 'default'})`);

      const kb = openKnowledgeBase(ctx);
      try {
        const outcome = await kb.search(query, top);

        if (ctx.options.json) {
          console.log(JSON.stringify(formatOutcomeJSON(outcome), null, 2));
          return;
        }

        if (outcome.status === 'empty') {
          ctx.log(chalk.yellow(formatOutcomeSummary(outcome)));
          ctx.log(chalk.dim(`Add documents with ${chalk.cyan('docqa ingest <file>')}`));
          return;
        }

        ctx.log(formatResults(outcome.results, { showOffsets: cmdOptions.offsets ?? false }));
        ctx.log('');
        ctx.log(chalk.dim(formatOutcomeSummary(outcome)));
      } finally {
        kb.close();
      }
    });
}
