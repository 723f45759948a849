/**
 * Database Migration Runner
 *
 * Applies the embedded migrations in order, each in its own transaction,
 * and records them in _migrations. Safe to run on every start.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 *
 * Failures are reported rather than thrown, so the caller decides whether
 * a partially migrated database is usable.
 */
export interface MigrationResult {
  /** Names of migrations applied by this run */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Connections already brought up to date in this process
const migrated = new WeakSet<Database.Database>();

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Migration 001: Documents and their chunks

CREATE TABLE IF NOT EXISTS documents (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  filename TEXT NOT NULL,
  checksum TEXT UNIQUE NOT NULL,     -- SHA-256 of the uploaded bytes
  file_size INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS document_chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  document_id INTEGER NOT NULL,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB,                    -- Float32 vector; NULL when embedding failed
  token_count INTEGER NOT NULL,
  start_char INTEGER NOT NULL,
  end_char INTEGER NOT NULL,         -- exclusive
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (document_id, chunk_index),
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_document_chunks_document ON document_chunks(document_id);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });
const AppliedMigrationRowSchema = z.object({ name: z.string(), applied_at: z.string() });

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function appliedNames(db: Database.Database): Set<string> {
  const rows = validateRows(
    MigrationNameRowSchema,
    db.prepare('SELECT name FROM _migrations').all(),
    '_migrations'
  );
  return new Set(rows.map((row) => row.name));
}

/**
 * Run all pending migrations.
 *
 * A failed migration does not stop later ones from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * if (result.failed.length > 0) {
 *   throw new StorageError(`Migration ${result.failed[0].name} failed`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  if (migrated.has(db)) {
    return { applied: [], failed: [] };
  }

  ensureMigrationsTable(db);
  const done = appliedNames(db);
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only remember success, so the next start retries failures
  if (failed.length === 0) {
    migrated.add(db);
  }

  return { applied, failed };
}

export function hasPendingMigrations(db: Database.Database): boolean {
  ensureMigrationsTable(db);
  return appliedNames(db).size < MIGRATIONS.length;
}

export function getAppliedMigrations(db: Database.Database): Array<{ name: string; applied_at: string }> {
  ensureMigrationsTable(db);
  return validateRows(
    AppliedMigrationRowSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
