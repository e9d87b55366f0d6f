/**
 * SQLite implementation of IFeedbackRepository.
 *
 * SQLite admits one writer at a time. Mutations queue on a single mutex and
 * each runs in a BEGIN IMMEDIATE transaction. A mutation gets a deadline
 * when it is requested; the busy wait on another connection's lock is cut
 * to whatever is left of it, so a queue behind a foreign lock drains within
 * the write timeout instead of one full busy timeout per entry.
 * Reads skip the mutex and rely on SQLite isolation.
 */

import { Mutex } from 'async-mutex';
import Database, { type Statement } from 'better-sqlite3';
import type { SqliteDatabase } from '../db.js';
import { StorageUnavailableError } from '../errors.js';
import type { IFeedbackRepository } from './IFeedbackRepository.js';
import type { FeedbackRow, NewFeedbackRow } from '../types/database.js';

export interface SqliteFeedbackRepositoryOptions {
  /** Longest a mutation may wait, from the call until its transaction starts. Default: 5000. */
  writeTimeoutMs?: number;
}

// AUTOINCREMENT keeps ids from being reused after the highest row is deleted
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS feedback (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    message TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

interface Statements {
  insert: Statement<[string, string, string], FeedbackRow>;
  findById: Statement<[number], FeedbackRow>;
  findAll: Statement<[], FeedbackRow>;
  update: Statement<[string, string, number], FeedbackRow>;
  delete: Statement<[number]>;
  count: Statement<[], { count: number }>;
  ping: Statement<[], { ok: number }>;
}

export class SqliteFeedbackRepository implements IFeedbackRepository {
  private readonly writeLock = new Mutex();
  private readonly writeTimeoutMs: number;
  /** The connection's own busy timeout, restored after every write. */
  private readonly busyTimeoutMs: number;
  private readonly stmts: Statements;

  constructor(
    private readonly db: SqliteDatabase,
    options?: SqliteFeedbackRepositoryOptions
  ) {
    this.writeTimeoutMs = options?.writeTimeoutMs ?? 5000;

    try {
      const busyTimeout: unknown = this.db.pragma('busy_timeout', { simple: true });
      this.busyTimeoutMs = typeof busyTimeout === 'number' ? busyTimeout : 0;
      this.db.exec(SCHEMA);
      this.stmts = {
        insert: this.db.prepare<[string, string, string], FeedbackRow>(
          'INSERT INTO feedback (message, created_at, updated_at) VALUES (?, ?, ?) RETURNING *'
        ),
        findById: this.db.prepare<[number], FeedbackRow>(
          'SELECT id, message, created_at, updated_at FROM feedback WHERE id = ?'
        ),
        findAll: this.db.prepare<[], FeedbackRow>(
          'SELECT id, message, created_at, updated_at FROM feedback ORDER BY id ASC'
        ),
        update: this.db.prepare<[string, string, number], FeedbackRow>(
          `UPDATE feedback
             SET message = ?,
                 updated_at = MAX(?, strftime('%Y-%m-%dT%H:%M:%fZ', updated_at, '+0.001 seconds'))
           WHERE id = ?
           RETURNING *`
        ),
        delete: this.db.prepare<[number]>('DELETE FROM feedback WHERE id = ?'),
        count: this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM feedback'),
        ping: this.db.prepare<[], { ok: number }>('SELECT 1 AS ok'),
      };
    } catch (err) {
      throw new StorageUnavailableError('initialize', err);
    }
  }

  async insert(row: NewFeedbackRow): Promise<FeedbackRow> {
    const inserted = await this.write('insert', () =>
      this.stmts.insert.get(row.message, row.created_at, row.updated_at)
    );
    if (!inserted) {
      throw new StorageUnavailableError('insert');
    }
    return inserted;
  }

  async findById(id: number): Promise<FeedbackRow | null> {
    return this.read('findById', () => this.stmts.findById.get(id) ?? null);
  }

  async findAll(): Promise<FeedbackRow[]> {
    return this.read('findAll', () => this.stmts.findAll.all());
  }

  async update(id: number, message: string, updatedAt: string): Promise<FeedbackRow | null> {
    return this.write('update', () => this.stmts.update.get(message, updatedAt, id) ?? null);
  }

  async delete(id: number): Promise<boolean> {
    return this.write('delete', () => this.stmts.delete.run(id).changes > 0);
  }

  async count(): Promise<number> {
    return this.read('count', () => this.stmts.count.get()?.count ?? 0);
  }

  async ping(): Promise<void> {
    this.read('ping', () => this.stmts.ping.get());
  }

  // ── Private ──

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StorageUnavailableError(operation, err);
    }
  }

  /**
   * Run `fn` as the only in-flight mutation, inside an immediate transaction.
   * A throw inside `fn` rolls the transaction back.
   */
  private async write<T>(operation: string, fn: () => T): Promise<T> {
    const deadline = performance.now() + this.writeTimeoutMs;
    const timedOut = `${operation} (write lock timeout)`;
    let clamped = false;

    try {
      return await this.writeLock.runExclusive(() => {
        const remaining = Math.floor(deadline - performance.now());
        if (remaining <= 0) {
          throw new StorageUnavailableError(timedOut);
        }

        clamped = remaining < this.busyTimeoutMs;
        this.setBusyTimeout(Math.min(remaining, this.busyTimeoutMs));
        try {
          return this.db.transaction(fn).immediate();
        } finally {
          this.setBusyTimeout(this.busyTimeoutMs);
        }
      });
    } catch (err) {
      if (err instanceof StorageUnavailableError) throw err;
      if (clamped && err instanceof Database.SqliteError && err.code === 'SQLITE_BUSY') {
        throw new StorageUnavailableError(timedOut, err);
      }
      throw new StorageUnavailableError(operation, err);
    }
  }

  private setBusyTimeout(ms: number): void {
    this.db.pragma(`busy_timeout = ${ms}`);
  }
}
