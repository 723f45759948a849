/**
 * Environment Variable Handler
 *
 * Loads the provider API key and docqa overrides, with .env support via
 * dotenv for local development.
 *
 * Keys are never logged or included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Nothing is required at load time. The API key is checked when a
 * provider is constructed, so offline commands (list, remove, usage) work
 * without one.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  /** Replaces ~/.docqa as the home for config, database and logs */
  DOCQA_HOME: z.string().min(1).optional(),
  DOCQA_SYSTEM_PROMPT: z.string().min(1).optional(),
  DOCQA_USER_PROMPT_TEMPLATE: z.string().min(1).optional(),
  DEBUG: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Loaded once at first access; _clearEnvCache() resets it in tests */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Empty strings count as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const read = (key: keyof EnvVars): string | undefined => {
    const value = process.env[key];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  _envCache = EnvSchema.parse({
    OPENAI_API_KEY: read('OPENAI_API_KEY'),
    DOCQA_HOME: read('DOCQA_HOME'),
    DOCQA_SYSTEM_PROMPT: read('DOCQA_SYSTEM_PROMPT'),
    DOCQA_USER_PROMPT_TEMPLATE: read('DOCQA_USER_PROMPT_TEMPLATE'),
    DEBUG: read('DEBUG'),
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether the OpenAI key is configured, without exposing it.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY?.trim());
}

/**
 * Setup instructions shown when the API key is missing.
 */
export const SETUP_INSTRUCTIONS = `
To answer questions and ingest documents, docqa needs an OpenAI API key:

  export OPENAI_API_KEY=<your key>

or put OPENAI_API_KEY=<your key> in a .env file in the working directory.
`.trim();

/**
 * Clear the cached environment. For tests that change process.env.
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
