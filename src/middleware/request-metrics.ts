/**
 * Request metrics middleware.
 * Counts every request by method, route template and status, and observes
 * its duration. Unmatched paths share one label so scrapers see bounded
 * cardinality.
 */

import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import type { Handler, Middleware } from './pipeline.js';

export const UNMATCHED_ROUTE = 'unmatched';

export function createRequestMetricsMiddleware(metrics: IMetricsProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const start = performance.now();
      let status = 500;

      try {
        const response = await next(req, ctx);
        status = response.status;
        return response;
      } finally {
        metrics.recordRequest({
          method: req.method,
          route: ctx.route ?? UNMATCHED_ROUTE,
          status,
          durationMs: performance.now() - start,
        });
      }
    };
  };
}
