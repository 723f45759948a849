/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docqa config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  SearchConfigSchema,
  GenerationConfigSchema,
  StorageConfigSchema,
  describeConfigKey,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  EmbeddingConfig,
  ChunkingConfig,
  GenerationConfig,
} from './schema.js';

// Defaults
export {
  DEFAULT_CONFIG,
  CONFIG_TEMPLATE,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_USER_PROMPT_TEMPLATE,
} from './defaults.js';

// Loader functions
export { loadConfig, getConfigValue, setConfigValue, listConfig, deepMerge } from './loader.js';

// Paths
export { getHomeDir, getConfigPath, getDatabasePath, getUsageLogPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validatePromptTemplate,
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  REQUIRED_PLACEHOLDERS,
  COMMANDS_REQUIRING_PROVIDER,
  COMMANDS_REQUIRING_PROMPTS,
} from './startup-validation.js';
export type { StartupValidationResult, StartupValidationOptions } from './startup-validation.js';
