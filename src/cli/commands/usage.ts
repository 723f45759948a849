/**
 * Usage Command
 *
 * Totals embedding calls recorded in the usage log:
 *   docqa usage               - Everything in the log
 *   docqa usage --days 7      - Only the last 7 days
 *   docqa usage --log <path>  - Read another log file
 */

import { existsSync, readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getUsageLogPath } from '../../config/paths.js';
import { summarizeUsage, type UsageTotals } from '../../indexer/embedder/usage-analyzer.js';
import { formatTable, type Column } from '../../utils/table.js';
import { parseInput, UsageOptionsSchema } from '../validation.js';

interface UsageCommandOptions {
  days?: string;
  log?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

type TotalsRow = UsageTotals & { name: string };

/**
 * Dollar amounts below a cent keep six decimals.
 */
export function formatCost(cost: number): string {
  return cost >= 0.01 || cost === 0 ? `$${cost.toFixed(2)}` : `$${cost.toFixed(6)}`;
}

const COLUMNS: Column<TotalsRow>[] = [
  { header: 'Name', value: (r) => r.name },
  { header: 'Calls', value: (r) => r.calls.toLocaleString(), align: 'right' },
  { header: 'Tokens', value: (r) => r.tokens.toLocaleString(), align: 'right' },
  { header: 'Requests', value: (r) => r.requests.toLocaleString(), align: 'right' },
  { header: 'Avg time', value: (r) => `${Math.round(r.averageMs)}ms`, align: 'right' },
  { header: 'Cost', value: (r) => formatCost(r.cost), align: 'right' },
];

function rowsOf(totals: Record<string, UsageTotals>): TotalsRow[] {
  return Object.entries(totals)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, t]) => ({ name, ...t }));
}

export function createUsageCommand(getContext: () => CommandContext): Command {
  return new Command('usage')
    .description('Summarize embedding usage and cost')
    .option('-d, --days <n>', 'Only count the last n days')
    .option('--log <path>', 'Usage log to read (default: <home>/logs/embedding-usage.log)')
    .action((cmdOptions: UsageCommandOptions) => {
      const ctx = getContext();
      const { days, log } = parseInput(UsageOptionsSchema, cmdOptions);
      const logPath = log ?? getUsageLogPath();
      const since = days === undefined ? undefined : new Date(Date.now() - days * DAY_MS);
      ctx.debug(`Reading ${logPath}${since ? ` since ${since.toISOString()}` : ''}`);

      if (!existsSync(logPath)) {
        if (ctx.options.json) {
          console.log(JSON.stringify({ logPath, found: false }));
        } else {
          ctx.log(chalk.yellow(`No usage recorded yet (${logPath} does not exist).`));
        }
        return;
      }

      const summary = summarizeUsage(readFileSync(logPath, 'utf-8').split('\n'), { since });

      if (ctx.options.json) {
        console.log(JSON.stringify({ logPath, found: true, ...summary }, null, 2));
        return;
      }

      if (summary.total.calls === 0) {
        ctx.log(chalk.yellow(`No embedding calls${days === undefined ? '' : ` in the last ${days} days`}.`));
        return;
      }

      ctx.log(chalk.bold('By operation'));
      ctx.log(formatTable(COLUMNS, rowsOf(summary.byOperation)));
      ctx.log('');
      ctx.log(chalk.bold('By model'));
      ctx.log(formatTable(COLUMNS, rowsOf(summary.byModel)));
      ctx.log('');
      ctx.log(
        `Total: ${summary.total.calls.toLocaleString()} call${summary.total.calls === 1 ? '' : 's'}, ` +
          `${summary.total.tokens.toLocaleString()} tokens, ${formatCost(summary.total.cost)}`
      );
      if (summary.skippedLines > 0) {
        ctx.warn(`Skipped ${summary.skippedLines} unrecognized line${summary.skippedLines === 1 ? '' : 's'}`);
      }
    });
}
