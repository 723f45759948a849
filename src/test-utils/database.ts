/**
 * In-memory SQLite with every migration applied.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';

export function createTestDatabase(): Database.Database {
  const db = openDatabase(':memory:');
  const result = runMigrations(db);
  if (result.failed.length > 0) {
    throw new Error(`Test database migration failed: ${result.failed[0].error}`);
  }
  return db;
}
