/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

// ── Responses ──

export interface FeedbackResponse {
  id: number;
  message: string;
  created_at: string;
  updated_at: string;
}

export interface DeleteFeedbackResponse {
  id: number;
  deleted: true;
  message: string;
}

export type HealthResponse =
  | { status: 'healthy'; timestamp: string; feedback_count: number }
  | { status: 'unhealthy'; timestamp: string };

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
