/**
 * Driver error wrapping
 *
 * better-sqlite3 throws SqliteError for busy databases, constraint
 * violations and I/O failures. Storage code runs its statements through
 * withStorageErrors: a database still locked after busy_timeout becomes a
 * TimeoutError, every other driver failure a StorageError.
 */

import Database from 'better-sqlite3';
import { StorageError, TimeoutError } from '../errors/index.js';

function busyTimeoutOf(db: Database.Database): number {
  const value: unknown = db.pragma('busy_timeout', { simple: true });
  return typeof value === 'number' ? value : 0;
}

export function withStorageErrors<T>(db: Database.Database, action: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      // SQLITE_BUSY and its extended codes (SQLITE_BUSY_SNAPSHOT, ...)
      if (error.code.startsWith('SQLITE_BUSY')) {
        throw new TimeoutError(action, busyTimeoutOf(db));
      }
      throw new StorageError(`${action} failed: ${error.message} (${error.code})`, error);
    }
    throw error;
  }
}
