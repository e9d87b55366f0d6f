/**
 * Operational endpoints.
 * GET /health  — 200 when storage answers, 503 otherwise
 * GET /metrics — Prometheus exposition text
 */

import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';

export function createHealthHandlers(container: Container) {
  const health: Handler = async () => {
    const result = await container.healthService.check();

    return new Response(JSON.stringify(result), {
      status: result.status === 'healthy' ? 200 : 503,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'no-store',
      },
    });
  };

  const metrics: Handler = async () => {
    // Refresh the gauge on scrape; a storage outage must not hide the other series
    try {
      container.metricsProvider.setRecordCount(await container.feedbackService.count());
    } catch (err) {
      container.logProvider.warn('feedback_count not refreshed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    return new Response(await container.metricsProvider.render(), {
      status: 200,
      headers: { 'Content-Type': container.metricsProvider.contentType },
    });
  };

  return { health, metrics };
}
