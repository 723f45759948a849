/**
 * List Command
 *
 * Displays stored documents, newest first:
 *   docqa list            - First page of documents
 *   docqa ls --page 2     - Alias for list, second page
 *   docqa list --json     - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import type { DocumentSummary } from '../../database/operations.js';
import { formatTable, type Column } from '../../utils/table.js';
import { openKnowledgeBase } from '../services.js';
import { ListOptionsSchema, parseInput } from '../validation.js';

interface ListCommandOptions {
  page?: string;
  perPage?: string;
}

/**
 * Format a timestamp relative to `now` (e.g., "2 hours ago")
 */
export function formatRelativeTime(isoString: string, now: Date = new Date()): string {
  const date = new Date(isoString);
  const diffSec = Math.floor((now.getTime() - date.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) return 'Just now';
  if (diffMin < 60) return `${diffMin} minute${diffMin === 1 ? '' : 's'} ago`;
  if (diffHour < 24) return `${diffHour} hour${diffHour === 1 ? '' : 's'} ago`;
  if (diffDay < 7) return `${diffDay} day${diffDay === 1 ? '' : 's'} ago`;

  return date.toISOString().slice(0, 10);
}

/**
 * Human-readable byte count: 0 B, 512 B, 1.5 KB, 2.0 MB
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const value = bytes / Math.pow(1024, i);

  return `${value.toFixed(i > 0 ? 1 : 0)} ${units[i]}`;
}

const COLUMNS: Column<DocumentSummary>[] = [
  { header: 'ID', value: (d) => d.id, align: 'right' },
  { header: 'Filename', value: (d) => d.filename },
  { header: 'Size', value: (d) => formatBytes(d.fileSize), align: 'right' },
  { header: 'Chunks', value: (d) => d.chunkCount.toLocaleString(), align: 'right' },
  { header: 'Updated', value: (d) => formatRelativeTime(d.updatedAt) },
];

export function createListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List stored documents')
    .option('-p, --page <n>', 'Page number', '1')
    .option('--per-page <n>', 'Documents per page (max 100)', '10')
    .action((cmdOptions: ListCommandOptions) => {
      const ctx = getContext();
      const { page, perPage } = parseInput(ListOptionsSchema, cmdOptions);
      ctx.debug(`Listing documents (page ${page}, ${perPage} per page)`);

      const kb = openKnowledgeBase(ctx);
      try {
        const result = kb.documents.list(page, perPage);

        if (ctx.options.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        if (result.total === 0) {
          ctx.log(chalk.yellow('No documents stored yet.'));
          ctx.log('');
          ctx.log(chalk.dim('Get started:'));
          ctx.log(`  ${chalk.cyan('docqa ingest ./notes.md')}`);
          return;
        }

        if (result.documents.length === 0) {
          ctx.log(chalk.yellow(`Page ${page} is empty (${result.total} documents in total).`));
          return;
        }

        const pages = Math.ceil(result.total / perPage);
        ctx.log(formatTable(COLUMNS, result.documents));
        ctx.log('');
        ctx.log(
          chalk.dim(`${result.total} document${result.total === 1 ? '' : 's'} stored, page ${page} of ${pages}`)
        );
      } finally {
        kb.close();
      }
    });
}
