/**
 * Startup Configuration Validation
 *
 * Two tiers:
 * - Prompt templates are fatal. A user template without {context} or
 *   {query} would produce nonsense prompts on every request, so it stops
 *   the command before any work starts.
 * - A missing API key is reported with setup instructions. Commands that
 *   never reach a provider (list, remove, usage, config) still run.
 */

import chalk from 'chalk';
import { hasApiKey, SETUP_INSTRUCTIONS } from './env.js';
import type { Config } from './schema.js';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// Prompt templates
// ============================================================================

export const REQUIRED_PLACEHOLDERS = ['{context}', '{query}'] as const;

/**
 * Throw ValidationError unless the template contains every placeholder.
 */
export function validatePromptTemplate(template: string): void {
  const missing = REQUIRED_PLACEHOLDERS.filter((placeholder) => !template.includes(placeholder));
  if (missing.length > 0) {
    throw new ValidationError(
      'User prompt template is missing required placeholders',
      missing.map((placeholder) => `generation.user_prompt_template: add ${placeholder}`)
    );
  }
}

// ============================================================================
// Command startup
// ============================================================================

export interface StartupValidationResult {
  /** Whether all required keys are present */
  valid: boolean;
  /** Error messages (will prevent the command from working) */
  errors: string[];
  /** Hint messages with setup instructions */
  hints: string[];
}

export interface StartupValidationOptions {
  /** The command talks to the embedding or generation provider */
  needsProvider?: boolean;
  /** The command builds prompts */
  needsPrompts?: boolean;
}

/**
 * Commands that call the OpenAI API.
 */
export const COMMANDS_REQUIRING_PROVIDER = ['ask', 'search', 'ingest'];

/**
 * Commands that render prompts.
 */
export const COMMANDS_REQUIRING_PROMPTS = ['ask'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    needsProvider: COMMANDS_REQUIRING_PROVIDER.includes(command),
    needsPrompts: COMMANDS_REQUIRING_PROMPTS.includes(command),
  };
}

/**
 * Validate configuration at command startup.
 *
 * @throws ValidationError when the prompt template is unusable
 */
export function validateStartupConfig(
  config: Config,
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const errors: string[] = [];
  const hints: string[] = [];

  if (options.needsPrompts) {
    validatePromptTemplate(config.generation.user_prompt_template);
  }

  if (options.needsProvider && !hasApiKey()) {
    errors.push('OpenAI API key not set');
    hints.push(SETUP_INSTRUCTIONS);
  }

  return { valid: errors.length === 0, errors, hints };
}

/**
 * Print startup validation errors to stderr.
 */
export function printStartupValidation(result: StartupValidationResult): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }
  for (const hint of result.hints) {
    console.error(chalk.dim(hint));
  }
}
