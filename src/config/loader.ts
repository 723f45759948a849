/**
 * Configuration Loader
 *
 * 1. Load config.toml from the docqa home directory if it exists
 * 2. Validate it against the partial schema
 * 3. Merge it over the defaults (user values win)
 * 4. Apply prompt overrides from the environment
 * 5. Validate the merged result as a whole
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { loadEnv } from './env.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;
type TomlTable = ReturnType<typeof TOML.parse>;
type TomlValue = TomlTable[string];

function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isTomlTable(value: TomlValue | undefined): value is TomlTable {
  return isPlainObject(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested tables merge key by key; arrays and scalars are replaced.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readConfigFile(configPath: string): TomlTable {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }
}

/**
 * Validate merged settings and apply environment prompt overrides.
 */
function finalize(merged: PlainObject): Config {
  const env = loadEnv();
  const withEnv = deepMerge(merged, {
    generation: {
      system_prompt: env.DOCQA_SYSTEM_PROMPT,
      user_prompt_template: env.DOCQA_USER_PROMPT_TEMPLATE,
    },
  });

  const result = ConfigSchema.safeParse(withEnv);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Load the merged config (defaults + user overrides + environment).
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return finalize(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);
  const validation = PartialConfigSchema.safeParse(parsed);
  if (!validation.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validation.error.issues)}`
    );
  }

  return finalize(deepMerge(DEFAULT_CONFIG, validation.data));
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue('embedding.model') => 'text-embedding-3-small'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a CLI string into a boolean, number or string
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write it back to the file.
 * The whole config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const last = parts.pop();
  if (last === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const configPath = getConfigPath();
  const config: TomlTable = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlTable(next)) {
      current = next;
    } else {
      const created: TomlTable = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = parseValue(value);

  const result = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!result.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(result.error.issues)}`,
      'Run: docqa config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * All config values as flat [key, value] entries
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  const flatten = (obj: PlainObject, prefix: string): void => {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  };

  flatten(loadConfig(), '');
  return entries;
}
