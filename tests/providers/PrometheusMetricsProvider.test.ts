import { describe, it, expect, beforeEach } from 'vitest';
import { PrometheusMetricsProvider } from '../../src/providers/PrometheusMetricsProvider.js';

function lines(text: string): string[] {
  return text.split('\n');
}

describe('PrometheusMetricsProvider', () => {
  let provider: PrometheusMetricsProvider;

  beforeEach(() => {
    provider = new PrometheusMetricsProvider();
  });

  it('should expose the Prometheus text content type', () => {
    expect(provider.contentType).toBe('text/plain; version=0.0.4; charset=utf-8');
  });

  it('should count operations by operation and outcome', async () => {
    provider.recordOperation({ operation: 'create', outcome: 'success', durationMs: 3 });
    provider.recordOperation({ operation: 'create', outcome: 'success', durationMs: 4 });
    provider.recordOperation({ operation: 'get', outcome: 'not_found', durationMs: 1 });

    const out = lines(await provider.render());

    expect(out).toContain('feedback_operations_total{operation="create",outcome="success"} 2');
    expect(out).toContain('feedback_operations_total{operation="get",outcome="not_found"} 1');
    expect(out).toContain(
      'feedback_operation_duration_seconds_count{operation="create",outcome="success"} 2'
    );
    expect(out).toContain(
      'feedback_operation_duration_seconds_sum{operation="create",outcome="success"} 0.007'
    );
  });

  it('should count HTTP requests by method, endpoint and status', async () => {
    provider.recordRequest({ method: 'GET', route: '/feedback/:id', status: 404, durationMs: 2 });

    const out = lines(await provider.render());

    expect(out).toContain('http_requests_total{method="GET",endpoint="/feedback/:id",status="404"} 1');
    expect(out).toContain(
      'http_request_duration_seconds_count{method="GET",endpoint="/feedback/:id"} 1'
    );
  });

  it('should track created records, errors and the record gauge', async () => {
    provider.recordCreated();
    provider.recordCreated();
    provider.recordError('TypeError');
    provider.setRecordCount(5);

    const out = lines(await provider.render());

    expect(out).toContain('feedback_created_total 2');
    expect(out).toContain('errors_total{error_type="TypeError"} 1');
    expect(out).toContain('feedback_count 5');
  });

  it('should keep registries independent between instances', async () => {
    const other = new PrometheusMetricsProvider();
    provider.recordCreated();

    expect(lines(await other.render())).toContain('feedback_created_total 0');
    expect(lines(await provider.render())).toContain('feedback_created_total 1');
  });

  it('should include Node process metrics only when asked', async () => {
    const withDefaults = new PrometheusMetricsProvider({ collectDefaults: true });

    expect(await withDefaults.render()).toContain('process_cpu_user_seconds_total');
    expect(await provider.render()).not.toContain('process_cpu_user_seconds_total');
  });
});
