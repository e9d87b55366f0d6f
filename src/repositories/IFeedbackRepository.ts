/**
 * Feedback data access interface.
 * Implementations own durable state; every method round-trips to the store
 * and fails with StorageUnavailableError when the store cannot answer.
 */

import type { FeedbackRow, NewFeedbackRow } from '../types/database.js';

export interface IFeedbackRepository {
  /** Insert a row; the store assigns the id. */
  insert(row: NewFeedbackRow): Promise<FeedbackRow>;

  findById(id: number): Promise<FeedbackRow | null>;

  /** All rows, ordered by id ascending. */
  findAll(): Promise<FeedbackRow[]>;

  /**
   * Replace the message and refresh updated_at.
   * updated_at always advances: a timestamp at or before the stored one
   * becomes the stored one plus 1 ms. Returns null when the id is absent.
   */
  update(id: number, message: string, updatedAt: string): Promise<FeedbackRow | null>;

  /** Returns false when the id is absent. */
  delete(id: number): Promise<boolean>;

  count(): Promise<number>;

  /** Resolves when the store is reachable. */
  ping(): Promise<void>;
}
