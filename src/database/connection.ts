/**
 * Database Connection Module
 *
 * Opens SQLite databases with better-sqlite3 and keeps the CLI's shared
 * connection to <home>/docqa.db.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDatabasePath } from '../config/paths.js';
import { StorageError } from '../errors/index.js';

export interface DatabaseOptions {
  /**
   * How long a statement waits on a locked database before failing.
   * @default 5000
   */
  busyTimeoutMs?: number;
}

// Module-level singleton instance
let db: Database.Database | null = null;
let exitHookRegistered = false;

/**
 * Open a database with the settings every docqa connection uses.
 * Pass ':memory:' for a throwaway database.
 *
 * @throws StorageError when the file can't be opened
 */
export function openDatabase(filename: string, options: DatabaseOptions = {}): Database.Database {
  let connection: Database.Database;
  try {
    connection = new Database(filename, { timeout: options.busyTimeoutMs ?? 5000 });
  } catch (error) {
    throw new StorageError(
      `Cannot open database at ${filename}`,
      error instanceof Error ? error : undefined
    );
  }

  // Foreign keys are OFF by default in SQLite; chunk cascades need them
  connection.pragma('foreign_keys = ON');
  // Readers see the last committed state while a writer replaces chunks
  connection.pragma('journal_mode = WAL');

  return connection;
}

/**
 * Get the shared database, creating the home directory on first call.
 *
 * @example
 * ```ts
 * const db = getDb({ busyTimeoutMs: config.storage.busy_timeout_ms });
 * runMigrations(db);
 * ```
 */
export function getDb(options: DatabaseOptions = {}): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getDatabasePath();
  mkdirSync(dirname(dbPath), { recursive: true });
  db = openDatabase(dbPath, options);

  if (!exitHookRegistered) {
    process.on('exit', () => closeDb());
    exitHookRegistered = true;
  }

  return db;
}

/**
 * Close the shared connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export function getDbPath(): string {
  return getDatabasePath();
}
