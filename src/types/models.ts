/**
 * Domain models: core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

export interface Feedback {
  id: number;
  message: string;
  createdAt: Date;
  updatedAt: Date;
}

// ── Instrumentation ──

export type FeedbackOperation = 'create' | 'get' | 'list' | 'update' | 'delete';

export type OperationOutcome =
  | 'success'
  | 'validation_error'
  | 'not_found'
  | 'storage_error';
