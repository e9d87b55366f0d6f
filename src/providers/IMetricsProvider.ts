/**
 * Metrics provider interface.
 * Instrumentation hooks updated synchronously around each feedback operation
 * and each HTTP request; rendered as text for a pull-based scraper.
 */

import type { FeedbackOperation, OperationOutcome } from '../types/models.js';

export interface OperationMetricEvent {
  operation: FeedbackOperation;
  outcome: OperationOutcome;
  durationMs: number;
}

export interface RequestMetricEvent {
  method: string;
  /** Route template (e.g. /feedback/:id), never the raw path. */
  route: string;
  status: number;
  durationMs: number;
}

export interface IMetricsProvider {
  /** MIME type of `render()` output. */
  readonly contentType: string;

  recordOperation(event: OperationMetricEvent): void;
  recordCreated(): void;
  recordRequest(event: RequestMetricEvent): void;
  recordError(errorType: string): void;
  setRecordCount(count: number): void;

  /** Current exposition text. */
  render(): Promise<string>;
}
