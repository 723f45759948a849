/**
 * Remove Command
 *
 * Deletes a stored document:
 *   docqa remove <id>         - Show what would be deleted (requires --force)
 *   docqa remove <id> --force - Delete without confirmation
 *
 * The document's chunks go with it (FOREIGN KEY ... ON DELETE CASCADE).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openKnowledgeBase } from '../services.js';
import { DocumentIdSchema, parseInput } from '../validation.js';

interface RemoveOptions {
  force?: boolean;
}

export function createRemoveCommand(getContext: () => CommandContext): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<id>', 'Id of the document to remove')
    .description('Remove a document and its chunks')
    .option('-f, --force', 'Skip confirmation')
    .action((rawId: string, options: RemoveOptions) => {
      const ctx = getContext();
      const id = parseInput(DocumentIdSchema, rawId);
      ctx.debug(`Remove command called for document ${id}`);

      const kb = openKnowledgeBase(ctx);
      try {
        // Confirmation check (unless --force or --json mode)
        if (!options.force && !ctx.options.json) {
          const document = kb.documents.get(id);
          const chunkCount = kb.store.countChunks(id);
          ctx.log(chalk.yellow(`This will permanently delete "${document.filename}" and its chunks.`));
          ctx.log(`  - ${chalk.dim('Chunks:')} ${chunkCount.toLocaleString()}`);
          ctx.log('');
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm deletion.`);
          process.exitCode = 1;
          return;
        }

        const chunksDeleted = kb.store.countChunks(id);
        const document = kb.documents.remove(id);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, document, deleted: { chunks: chunksDeleted } }));
        } else {
          ctx.log(`${chalk.green('✓')} Removed document ${id} (${chalk.cyan(document.filename)})`);
          ctx.log(`  - Deleted ${chunksDeleted.toLocaleString()} chunks`);
        }
      } finally {
        kb.close();
      }
    });
}
