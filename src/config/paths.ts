/**
 * File locations under the docqa home directory.
 *
 * ~/.docqa by default; DOCQA_HOME moves everything (tests point it at a
 * temp directory).
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

export const CONFIG_FILE_NAME = 'config.toml';
export const DATABASE_FILE_NAME = 'docqa.db';
export const USAGE_LOG_FILE_NAME = 'embedding-usage.log';

export function getHomeDir(): string {
  return getEnv('DOCQA_HOME') ?? path.join(os.homedir(), '.docqa');
}

export function getConfigPath(): string {
  return path.join(getHomeDir(), CONFIG_FILE_NAME);
}

export function getDatabasePath(): string {
  return path.join(getHomeDir(), DATABASE_FILE_NAME);
}

export function getUsageLogPath(): string {
  return path.join(getHomeDir(), 'logs', USAGE_LOG_FILE_NAME);
}
