/**
 * Body parsing middleware.
 * Reads the request body once and stores the parsed JSON on the context.
 * An empty or malformed body leaves `ctx.body` undefined; whether that is
 * acceptable is decided by the validator downstream.
 */

import type { Handler, Middleware } from './pipeline.js';

export const parseJsonBody: Middleware = (next: Handler): Handler => {
  return async (req, ctx) => {
    const text = await req.text();

    let body: unknown;
    if (text.trim().length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        body = undefined;
      }
    }

    return next(req, { ...ctx, body });
  };
};
