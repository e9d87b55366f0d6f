/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic; works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import { pipeline } from '../middleware/index.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createFeedbackHandlers } from './feedback.js';
import { createHealthHandlers } from './health.js';

interface Route {
  method: string;
  /** Template used for metrics and logs, e.g. /feedback/:id */
  path: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const feedback = createFeedbackHandlers(container);
  const ops = createHealthHandlers(container);

  const routes: Route[] = [
    // Feedback
    { method: 'POST', path: '/feedback', pattern: /^\/feedback\/?$/, handler: feedback.create },
    { method: 'GET', path: '/feedback', pattern: /^\/feedback\/?$/, handler: feedback.list },
    { method: 'GET', path: '/feedback/:id', pattern: /^\/feedback\/(?<id>\d+)\/?$/, handler: feedback.getById },
    { method: 'PUT', path: '/feedback/:id', pattern: /^\/feedback\/(?<id>\d+)\/?$/, handler: feedback.update },
    { method: 'DELETE', path: '/feedback/:id', pattern: /^\/feedback\/(?<id>\d+)\/?$/, handler: feedback.delete },

    // Operations
    { method: 'GET', path: '/health', pattern: /^\/health\/?$/, handler: ops.health },
    { method: 'GET', path: '/metrics', pattern: /^\/metrics\/?$/, handler: ops.metrics },
  ];

  const dispatch: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      const match = route.method === method ? route.pattern.exec(url.pathname) : null;
      if (match) {
        ctx.route = route.path;
        ctx.params = { ...match.groups };
        return route.handler(req, ctx);
      }
    }

    // Check if path matches but method doesn't
    const pathRoutes = routes.filter((r) => r.pattern.test(url.pathname));
    if (pathRoutes.length > 0) {
      ctx.route = pathRoutes[0].path;
      const allowed = pathRoutes.map((r) => r.method).join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json' },
      }
    );
  };

  const wrapped = pipeline(
    container.logging,
    container.requestMetrics,
    container.errorHandler
  )(dispatch);

  const handle: Handler = async (req, ctx) => addCorsHeaders(await wrapped(req, ctx));

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
