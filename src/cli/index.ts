#!/usr/bin/env node
/**
 * docqa CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { createListCommand } from './commands/list.js';
import { createRemoveCommand } from './commands/remove.js';
import { createSearchCommand } from './commands/search.js';
import { createUsageCommand } from './commands/usage.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  loadConfig,
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

const program = new Command();

program
  .name('docqa')
  .description('Question answering over your documents: chunk, embed, retrieve, answer')
  .version(version, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docqa ingest ./guide.md')}                  Store a document
  ${chalk.cyan('docqa search "machine learning"')}          Find matching chunks
  ${chalk.cyan('docqa ask "What is machine learning?"')}    Answer from stored documents
  ${chalk.cyan('docqa list')}                               List stored documents
  ${chalk.cyan('docqa usage --days 7')}                     Embedding cost this week
  ${chalk.cyan('docqa config set search.default_top_k 5')}  Change a setting
`);

/**
 * Logging utilities handed to every command
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores global options on the root command after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createIngestCommand(getContext));
program.addCommand(createListCommand(getContext));
program.addCommand(createRemoveCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createUsageCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: docqa --help  to see available commands');
});

// Check the API key and prompt template before commands that need them
program.hook('preAction', (_thisCommand, actionCommand) => {
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());
  if (!validationOptions.needsProvider && !validationOptions.needsPrompts) {
    return;
  }

  const result = validateStartupConfig(loadConfig(), validationOptions);
  if (!result.valid) {
    printStartupValidation(result);
    throw new CLIError('Configuration validation failed', 'Fix the issues above and try again', 4);
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
