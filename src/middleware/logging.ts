/**
 * Request logging middleware.
 * One event per request, written after the response is known. The error
 * handler sits inside this middleware, so a thrown handler error arrives
 * here as a rendered response; anything that still escapes is logged as a
 * 500 on its way out.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

/** The record a request addressed, when the route carries one. */
function feedbackIdOf(ctx: HandlerContext): number | undefined {
  const id = ctx.params.id;
  return id === undefined ? undefined : Number(id);
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    const { pathname } = new URL(req.url);
    const start = performance.now();
    let status = 500;

    try {
      const response = await next(req, ctx);
      status = response.status;
      return response;
    } finally {
      const durationMs = Math.round(performance.now() - start);
      const feedbackId = feedbackIdOf(ctx);

      const event: RequestLogEvent = {
        level: levelForStatus(status),
        message: `${req.method} ${pathname} ${status} in ${durationMs}ms`,
        method: req.method,
        path: pathname,
        status,
        durationMs,
      };
      if (ctx.route) event.route = ctx.route;
      if (feedbackId !== undefined) event.fields = { feedbackId };

      logProvider.log(event);
    }
  };
}
