/**
 * Prompt rendering
 */

import { validatePromptTemplate } from '../config/startup-validation.js';
import { ValidationError } from '../errors/index.js';
import type { PromptSettings } from './types.js';

const PLACEHOLDER_PATTERN = /\{(context|query)\}/g;

export interface PromptValues {
  context: string;
  query: string;
}

/**
 * Fill {context} and {query} in one pass. Placeholder-like text inside
 * the values is left as it is.
 */
export function renderUserPrompt(template: string, values: PromptValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) =>
    key === 'context' ? values.context : values.query
  );
}

/**
 * @throws ValidationError when the system prompt is blank or the user
 *   template lacks a placeholder
 */
export function validatePrompts(prompts: PromptSettings): void {
  if (prompts.systemPrompt.trim().length === 0) {
    throw new ValidationError('System prompt cannot be empty', ['generation.system_prompt: set a prompt']);
  }
  validatePromptTemplate(prompts.userPromptTemplate);
}
