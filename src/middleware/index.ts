export { pipeline, createContext } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler } from './error-handler.js';
export { createLoggingMiddleware } from './logging.js';
export { createRequestMetricsMiddleware, UNMATCHED_ROUTE } from './request-metrics.js';
export { parseJsonBody } from './parse-json-body.js';
export { bodyLimit, DEFAULT_MAX_BODY_BYTES } from './body-limit.js';
