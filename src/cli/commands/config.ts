/**
 * Config Command
 *
 * Reads and edits <home>/config.toml:
 *   docqa config list [section]     - Values by section, with what each key does
 *   docqa config get <key>          - One value, e.g. chunking.overlap_tokens
 *   docqa config set <key> <value>  - Validate one value and write it
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, listConfig, setConfigValue } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { describeConfigKey } from '../../config/schema.js';
import { validatePromptTemplate } from '../../config/startup-validation.js';
import { CLIError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * What a changed key means for documents already stored, if anything.
 */
export function reingestNotice(key: string): string | undefined {
  if (key.startsWith('chunking.')) {
    return 'Stored documents keep their chunks until re-ingested: docqa ingest <file> --replace <id>';
  }
  if (key === 'embedding.model' || key === 'embedding.dimensions') {
    return 'Stored embeddings come from the previous model; re-ingest every document before searching.';
  }
  return undefined;
}

/**
 * Display form of a value. Multi-line strings (the prompts) stay on one
 * line with their newlines escaped.
 */
export function formatConfigValue(value: unknown): string {
  if (typeof value === 'string') return value.includes('\n') ? JSON.stringify(value) : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function sectionOf(key: string): string {
  return key.split('.')[0] ?? key;
}

/**
 * Report an unknown key with the keys that do exist nearby.
 */
function reportUnknownKey(ctx: CommandContext, key: string): void {
  process.exitCode = 1;
  const entries = listConfig();
  const section = sectionOf(key);
  const siblings = entries.map(([name]) => name).filter((name) => sectionOf(name) === section);
  const suggestion =
    siblings.length > 0
      ? `Keys in ${section}: ${siblings.map((name) => name.slice(section.length + 1)).join(', ')}`
      : `Sections: ${[...new Set(entries.map(([name]) => sectionOf(name)))].join(', ')}`;

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: `Unknown config key: ${key}`, hint: suggestion }));
    return;
  }
  ctx.error(`Unknown config key: ${key}`);
  ctx.log(suggestion);
}

/**
 * Config errors are reported and set the exit code instead of throwing,
 * so `config` works while the file itself is broken.
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  process.exitCode = 1;
  const message = error instanceof Error ? error.message : String(error);
  const hint = error instanceof CLIError ? error.hint : undefined;

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message, hint }));
    return;
  }
  ctx.error(message);
  if (hint) {
    ctx.log(chalk.dim(hint));
  }
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Show or change settings in config.toml');

  configCmd
    .command('list [section]')
    .alias('ls')
    .description('List settings by section (embedding, chunking, search, generation, storage)')
    .action((section: string | undefined) => {
      const ctx = getContext();

      try {
        const entries = listConfig().filter(([key]) => section === undefined || sectionOf(key) === section);
        if (entries.length === 0) {
          reportUnknownKey(ctx, section ?? '');
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        let current = '';
        for (const [key, value] of entries) {
          const group = sectionOf(key);
          if (group !== current) {
            if (current !== '') ctx.log('');
            ctx.log(chalk.bold(`[${group}]`));
            current = group;
          }
          ctx.log(`  ${chalk.cyan(key.slice(group.length + 1))} = ${chalk.yellow(formatConfigValue(value))}`);
          const description = describeConfigKey(key);
          if (description) {
            ctx.log(chalk.dim(`    ${description}`));
          }
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('get <key>')
    .description('Print one setting (e.g. docqa config get chunking.overlap_tokens)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);
        if (value === undefined) {
          reportUnknownKey(ctx, key);
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value, description: describeConfigKey(key) }));
        } else {
          ctx.log(formatConfigValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Change one setting (e.g. docqa config set search.default_top_k 5)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      if (describeConfigKey(key) === undefined) {
        reportUnknownKey(ctx, key);
        return;
      }

      try {
        if (key === 'generation.user_prompt_template') {
          validatePromptTemplate(value);
        }
        setConfigValue(key, value);
        const stored = getConfigValue(key);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: stored }));
          return;
        }

        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(stored))}`);
        const notice = reingestNotice(key);
        if (notice) {
          ctx.log(chalk.dim(notice));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}
