/**
 * Storage reachability check backing GET /health.
 */

import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { HealthResponse } from '../types/api.js';
import type { Clock } from './FeedbackService.js';

export class HealthService {
  constructor(
    private readonly feedbackRepo: IFeedbackRepository,
    private readonly logger: ILogProvider,
    private readonly clock: Clock = () => new Date()
  ) {}

  async check(): Promise<HealthResponse> {
    const timestamp = this.clock().toISOString();

    try {
      await this.feedbackRepo.ping();
      const count = await this.feedbackRepo.count();
      return { status: 'healthy', timestamp, feedback_count: count };
    } catch (err) {
      this.logger.error('Health check failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      return { status: 'unhealthy', timestamp };
    }
  }
}
