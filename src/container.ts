/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, the repository is backed by the SQLite file;
 * tests swap in mocks or an in-memory database.
 */

import type { IFeedbackRepository } from './repositories/IFeedbackRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IMetricsProvider } from './providers/IMetricsProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import { FeedbackService, type Clock } from './services/FeedbackService.js';
import { FeedbackValidator, DEFAULT_MAX_MESSAGE_LENGTH } from './services/FeedbackValidator.js';
import { HealthService } from './services/HealthService.js';
import { bodyLimit, DEFAULT_MAX_BODY_BYTES } from './middleware/body-limit.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createRequestMetricsMiddleware } from './middleware/request-metrics.js';

export interface Container {
  feedbackService: FeedbackService;
  healthService: HealthService;
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
  bodyLimit: Middleware;
  logging: Middleware;
  requestMetrics: Middleware;
  errorHandler: Middleware;
}

export function createContainer(deps: {
  feedbackRepo: IFeedbackRepository;
  logProvider: ILogProvider;
  metricsProvider: IMetricsProvider;
  maxMessageLength?: number;
  maxBodyBytes?: number;
  clock?: Clock;
}): Container {
  const validator = new FeedbackValidator(deps.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH);
  const feedbackService = new FeedbackService(
    deps.feedbackRepo,
    validator,
    deps.metricsProvider,
    deps.logProvider,
    deps.clock
  );
  const healthService = new HealthService(deps.feedbackRepo, deps.logProvider, deps.clock);

  return {
    feedbackService,
    healthService,
    logProvider: deps.logProvider,
    metricsProvider: deps.metricsProvider,
    bodyLimit: bodyLimit(deps.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES),
    logging: createLoggingMiddleware(deps.logProvider),
    requestMetrics: createRequestMetricsMiddleware(deps.metricsProvider),
    errorHandler: createErrorHandler({
      logger: deps.logProvider,
      metrics: deps.metricsProvider,
    }),
  };
}
