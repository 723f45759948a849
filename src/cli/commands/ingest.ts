/**
 * Ingest Command
 *
 * Uploads a text file, splits it into chunks and stores their embeddings:
 *   docqa ingest <file>                - Store a new document
 *   docqa ingest <file> --replace <id> - Replace a stored document's content
 *
 * Nothing is written until every chunk has its embedding, so a failed
 * ingest leaves the store as it was.
 */

import { readFileSync, statSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { createProgressReporter } from '../utils/progress.js';
import { openKnowledgeBase } from '../services.js';
import { IngestOptionsSchema, parseInput } from '../validation.js';

interface IngestCommandOptions {
  replace?: string;
}

/**
 * Read a file's bytes.
 *
 * @throws FileNotFoundError when the path doesn't exist
 * @throws ValidationError when the path is a directory
 */
export function readUpload(path: string): Uint8Array {
  const absolute = resolve(path);
  let isFile: boolean;
  try {
    isFile = statSync(absolute).isFile();
  } catch {
    throw new FileNotFoundError(absolute);
  }
  if (!isFile) {
    throw new ValidationError(`Not a file: ${absolute}`, ['Pass a .txt or .md file']);
  }
  return readFileSync(absolute);
}

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<file>', 'Text or Markdown file to ingest')
    .description('Chunk a document and store its embeddings')
    .option('-r, --replace <id>', 'Replace the content of an existing document')
    .action(async (file: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const { replace } = parseInput(IngestOptionsSchema, cmdOptions);
      ctx.debug(`Ingesting ${file}${replace ? ` into document ${replace}` : ''}`);

      const bytes = readUpload(file);
      const filename = basename(file);
      const kb = openKnowledgeBase(ctx);
      const progress = createProgressReporter({ json: ctx.options.json });

      try {
        if (replace === undefined) {
          const { document, chunks } = await kb.documents.upload(filename, bytes, progress.callbacks());

          if (ctx.options.json) {
            console.log(JSON.stringify({ success: true, document, chunkCount: chunks.length }));
            return;
          }
          ctx.log(`${chalk.green('✓')} Stored ${chalk.cyan(document.filename)} as document ${document.id}`);
          ctx.log(`  - ${chunks.length.toLocaleString()} chunks`);
        } else {
          const { document, chunks, contentChanged } = await kb.documents.reupload(
            replace,
            filename,
            bytes,
            progress.callbacks()
          );

          if (ctx.options.json) {
            console.log(
              JSON.stringify({ success: true, document, chunkCount: chunks.length, contentChanged })
            );
            return;
          }
          ctx.log(`${chalk.green('✓')} Replaced document ${document.id} (${chalk.cyan(document.filename)})`);
          ctx.log(`  - ${chunks.length.toLocaleString()} chunks`);
          if (!contentChanged) {
            ctx.log(chalk.dim('  - Content unchanged; embeddings regenerated'));
          }
        }
      } catch (error) {
        progress.fail();
        throw error;
      } finally {
        kb.close();
      }
    });
}
