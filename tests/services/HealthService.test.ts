import { describe, it, expect, beforeEach } from 'vitest';
import { HealthService } from '../../src/services/HealthService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockFeedbackRepository } from '../mocks/MockFeedbackRepository.js';

describe('HealthService', () => {
  const now = new Date('2026-01-15T12:00:00.000Z');
  let repo: MockFeedbackRepository;
  let logs: ConsoleLogProvider;
  let service: HealthService;

  beforeEach(() => {
    repo = new MockFeedbackRepository();
    logs = new ConsoleLogProvider();
    service = new HealthService(repo, logs, () => now);
  });

  it('should report healthy with the record count', async () => {
    await repo.insert({ message: 'a', created_at: now.toISOString(), updated_at: now.toISOString() });

    expect(await service.check()).toEqual({
      status: 'healthy',
      timestamp: '2026-01-15T12:00:00.000Z',
      feedback_count: 1,
    });
    expect(logs.events).toHaveLength(0);
  });

  it('should report unhealthy and log when storage is unreachable', async () => {
    repo.unavailable = true;

    expect(await service.check()).toEqual({
      status: 'unhealthy',
      timestamp: '2026-01-15T12:00:00.000Z',
    });
    expect(logs.events).toHaveLength(1);
    expect(logs.events[0]).toMatchObject({
      level: 'error',
      message: 'Health check failed',
      fields: { error: 'Service unavailable' },
    });
  });
});
