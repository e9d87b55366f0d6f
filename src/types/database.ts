/**
 * Database row types mirroring the SQLite table schema.
 * Kept separate so the database can evolve independently of domain models.
 * Timestamps are stored as ISO-8601 UTC text, which sorts chronologically.
 */

export interface FeedbackRow {
  id: number;
  message: string;
  created_at: string;
  updated_at: string;
}

export type NewFeedbackRow = Omit<FeedbackRow, 'id'>;
