/**
 * prom-client implementation of IMetricsProvider.
 * Each instance owns its Registry, so several containers (e.g. in tests)
 * never collide on metric names.
 */

import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';
import type {
  IMetricsProvider,
  OperationMetricEvent,
  RequestMetricEvent,
} from './IMetricsProvider.js';

export interface PrometheusMetricsProviderOptions {
  /** Also collect Node.js process metrics (heap, event loop lag, ...). Default: false. */
  collectDefaults?: boolean;
}

const DURATION_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export class PrometheusMetricsProvider implements IMetricsProvider {
  readonly registry: Registry;

  private readonly httpRequests: Counter<'method' | 'endpoint' | 'status'>;
  private readonly httpDuration: Histogram<'method' | 'endpoint'>;
  private readonly operations: Counter<'operation' | 'outcome'>;
  private readonly operationDuration: Histogram<'operation' | 'outcome'>;
  private readonly created: Counter;
  private readonly errors: Counter<'error_type'>;
  private readonly recordCount: Gauge;

  constructor(options?: PrometheusMetricsProviderOptions) {
    this.registry = new Registry();
    if (options?.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    const registers = [this.registry];

    this.httpRequests = new Counter({
      name: 'http_requests_total',
      help: 'Total HTTP requests',
      labelNames: ['method', 'endpoint', 'status'] as const,
      registers,
    });
    this.httpDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration',
      labelNames: ['method', 'endpoint'] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.operations = new Counter({
      name: 'feedback_operations_total',
      help: 'Feedback operations by outcome',
      labelNames: ['operation', 'outcome'] as const,
      registers,
    });
    this.operationDuration = new Histogram({
      name: 'feedback_operation_duration_seconds',
      help: 'Feedback operation duration',
      labelNames: ['operation', 'outcome'] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.created = new Counter({
      name: 'feedback_created_total',
      help: 'Feedback records created',
      registers,
    });
    this.errors = new Counter({
      name: 'errors_total',
      help: 'Total errors',
      labelNames: ['error_type'] as const,
      registers,
    });
    this.recordCount = new Gauge({
      name: 'feedback_count',
      help: 'Current feedback count',
      registers,
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  recordOperation(event: OperationMetricEvent): void {
    const labels = { operation: event.operation, outcome: event.outcome };
    this.operations.inc(labels);
    this.operationDuration.observe(labels, event.durationMs / 1000);
  }

  recordCreated(): void {
    this.created.inc();
  }

  recordRequest(event: RequestMetricEvent): void {
    this.httpRequests.inc({
      method: event.method,
      endpoint: event.route,
      status: String(event.status),
    });
    this.httpDuration.observe(
      { method: event.method, endpoint: event.route },
      event.durationMs / 1000
    );
  }

  recordError(errorType: string): void {
    this.errors.inc({ error_type: errorType });
  }

  setRecordCount(count: number): void {
    this.recordCount.set(count);
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
