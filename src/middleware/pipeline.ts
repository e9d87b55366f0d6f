/**
 * Composable middleware pipeline for Request -> Response handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Route template matched by the router (e.g. /feedback/:id); null when nothing matched. */
  route: string | null;
  /** Path parameters captured by the router. */
  params: Record<string, string>;
  /** Parsed JSON body, set by parseJsonBody; undefined when absent or not JSON. */
  body?: unknown;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}

export function createContext(): HandlerContext {
  return { route: null, params: {} };
}
