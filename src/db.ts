/**
 * SQLite handle lifecycle.
 * The handle is opened once at process start, injected into the repository,
 * and closed at shutdown.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StorageUnavailableError } from './errors.js';

export type SqliteDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** How long a statement waits on a lock held by another connection. Default: 5000. */
  busyTimeoutMs?: number;
}

export const IN_MEMORY = ':memory:';

export function openDatabase(path: string, options?: OpenDatabaseOptions): SqliteDatabase {
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path, { timeout: options?.busyTimeoutMs ?? 5000 });

    // WAL lets readers proceed while a write transaction is open
    if (path !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    return db;
  } catch (err) {
    throw new StorageUnavailableError('open', err);
  }
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
  }
}
