import { describe, it, expect, beforeEach } from 'vitest';
import { FeedbackService } from '../../src/services/FeedbackService.js';
import { FeedbackValidator } from '../../src/services/FeedbackValidator.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import {
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from '../../src/errors.js';
import { MockFeedbackRepository } from '../mocks/MockFeedbackRepository.js';
import { MockMetricsProvider } from '../mocks/MockMetricsProvider.js';

describe('FeedbackService', () => {
  let service: FeedbackService;
  let repo: MockFeedbackRepository;
  let metrics: MockMetricsProvider;
  let logs: ConsoleLogProvider;
  let now: Date;

  function advance(ms: number): void {
    now = new Date(now.getTime() + ms);
  }

  beforeEach(() => {
    now = new Date('2026-01-15T12:00:00.000Z');
    repo = new MockFeedbackRepository();
    metrics = new MockMetricsProvider();
    logs = new ConsoleLogProvider();
    service = new FeedbackService(
      repo,
      new FeedbackValidator(500),
      metrics,
      logs,
      () => now
    );
  });

  // ── create ──

  describe('create', () => {
    it('should store the trimmed message with equal timestamps', async () => {
      const result = await service.create({ message: '  Great service!  ' });

      expect(result).toEqual({
        id: 1,
        message: 'Great service!',
        createdAt: new Date('2026-01-15T12:00:00.000Z'),
        updatedAt: new Date('2026-01-15T12:00:00.000Z'),
      });
      expect(repo.getAll()).toEqual([
        {
          id: 1,
          message: 'Great service!',
          created_at: '2026-01-15T12:00:00.000Z',
          updated_at: '2026-01-15T12:00:00.000Z',
        },
      ]);
    });

    it('should count the creation and record a success', async () => {
      await service.create({ message: 'hello' });

      expect(metrics.created).toBe(1);
      expect(metrics.outcomes()).toEqual(['create:success']);
      expect(metrics.operations[0].durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should log the new id', async () => {
      const result = await service.create({ message: 'hello' });

      expect(logs.events).toHaveLength(1);
      expect(logs.events[0]).toMatchObject({
        level: 'info',
        message: 'Feedback created',
        fields: { feedbackId: result.id },
      });
    });

    it('should reject "" and "   " with EmptyMessage and {} with MissingField', async () => {
      await expect(service.create({ message: '' })).rejects.toHaveProperty('kind', 'EmptyMessage');
      await expect(service.create({ message: '   ' })).rejects.toHaveProperty('kind', 'EmptyMessage');
      await expect(service.create({})).rejects.toHaveProperty('kind', 'MissingField');

      expect(repo.getAll()).toHaveLength(0);
      expect(metrics.created).toBe(0);
    });

    it('should record validation failures before rethrowing', async () => {
      await expect(service.create({ message: '' })).rejects.toBeInstanceOf(ValidationError);
      expect(metrics.outcomes()).toEqual(['create:validation_error']);
    });

    it('should propagate storage failures unchanged and record storage_error', async () => {
      repo.unavailable = true;

      const error = await service.create({ message: 'hello' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageUnavailableError);
      expect((error as StorageUnavailableError).message).toBe('Service unavailable');
      expect(metrics.outcomes()).toEqual(['create:storage_error']);
      expect(metrics.created).toBe(0);
    });

    it('should log storage failures with the driver cause', async () => {
      repo.unavailable = true;
      await service.create({ message: 'hello' }).catch(() => undefined);

      expect(logs.events).toHaveLength(1);
      expect(logs.events[0]).toMatchObject({
        level: 'error',
        message: 'Feedback create failed',
        fields: { error: 'Service unavailable', cause: 'database is locked' },
      });
    });

    it('should assign strictly increasing ids that survive deletes', async () => {
      const a = await service.create({ message: 'a' });
      const b = await service.create({ message: 'b' });
      await service.delete(b.id);
      const c = await service.create({ message: 'c' });

      expect([a.id, b.id, c.id]).toEqual([1, 2, 3]);
    });
  });

  // ── getById ──

  describe('getById', () => {
    it('should return the same record on repeated reads', async () => {
      const created = await service.create({ message: 'stable' });

      const first = await service.getById(created.id);
      const second = await service.getById(created.id);

      expect(first).toEqual(created);
      expect(second).toEqual(first);
    });

    it('should throw NotFoundError for an id never created', async () => {
      await expect(service.getById(999)).rejects.toBeInstanceOf(NotFoundError);
      expect(metrics.outcomes()).toEqual(['get:not_found']);
    });

    it('should treat ids beyond the safe integer range as not found', async () => {
      await expect(service.getById(Number.MAX_SAFE_INTEGER + 2)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should use a generic not-found message', async () => {
      await expect(service.getById(5)).rejects.toThrow('Feedback not found');
    });
  });

  // ── list ──

  describe('list', () => {
    it('should return an empty array when nothing exists', async () => {
      expect(await service.list()).toEqual([]);
      expect(metrics.outcomes()).toEqual(['list:success']);
    });

    it('should return records ordered by id ascending', async () => {
      await service.create({ message: 'first' });
      advance(1000);
      await service.create({ message: 'second' });
      advance(1000);
      await service.create({ message: 'third' });

      const result = await service.list();
      expect(result.map((f) => f.id)).toEqual([1, 2, 3]);
      expect(result.map((f) => f.message)).toEqual(['first', 'second', 'third']);
    });
  });

  // ── update ──

  describe('update', () => {
    it('should replace the message and advance updatedAt only', async () => {
      const created = await service.create({ message: 'original' });
      advance(5000);

      const updated = await service.update(created.id, { message: ' Updated ' });

      expect(updated).toEqual({
        id: created.id,
        message: 'Updated',
        createdAt: new Date('2026-01-15T12:00:00.000Z'),
        updatedAt: new Date('2026-01-15T12:00:05.000Z'),
      });
      expect(metrics.outcomes()).toEqual(['create:success', 'update:success']);
    });

    it('should still advance updatedAt when the clock steps back', async () => {
      const created = await service.create({ message: 'original' });
      advance(10_000);
      await service.update(created.id, { message: 'later' });
      advance(-60_000);

      const updated = await service.update(created.id, { message: 'skewed' });

      expect(updated.message).toBe('skewed');
      expect(updated.updatedAt).toEqual(new Date('2026-01-15T12:00:10.001Z'));
    });

    it('should advance updatedAt past createdAt within the same millisecond', async () => {
      const created = await service.create({ message: 'original' });

      const updated = await service.update(created.id, { message: 'instant' });

      expect(updated.updatedAt).toEqual(new Date('2026-01-15T12:00:00.001Z'));
      expect(updated.updatedAt.getTime()).toBeGreaterThan(created.createdAt.getTime());
    });

    it('should validate before checking existence', async () => {
      await expect(service.update(999, { message: '' })).rejects.toHaveProperty('kind', 'EmptyMessage');
      expect(metrics.outcomes()).toEqual(['update:validation_error']);
    });

    it('should throw NotFoundError for a missing id with a valid body', async () => {
      await expect(service.update(999, { message: 'ok' })).rejects.toBeInstanceOf(NotFoundError);
      expect(metrics.outcomes()).toEqual(['update:not_found']);
    });
  });

  // ── delete ──

  describe('delete', () => {
    it('should confirm deletion', async () => {
      const created = await service.create({ message: 'bye' });

      expect(await service.delete(created.id)).toEqual({ id: created.id, deleted: true });
      expect(metrics.outcomes()).toEqual(['create:success', 'delete:success']);
    });

    it('should make the id permanently unresolvable', async () => {
      const created = await service.create({ message: 'bye' });
      await service.delete(created.id);

      await expect(service.getById(created.id)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.update(created.id, { message: 'again' })).rejects.toBeInstanceOf(
        NotFoundError
      );
      await expect(service.delete(created.id)).rejects.toBeInstanceOf(NotFoundError);
      expect(metrics.outcomes().slice(2)).toEqual([
        'get:not_found',
        'update:not_found',
        'delete:not_found',
      ]);
    });
  });

  // ── count ──

  describe('count', () => {
    it('should report present records without recording an operation', async () => {
      await service.create({ message: 'a' });
      await service.create({ message: 'b' });

      expect(await service.count()).toBe(2);
      expect(metrics.operations).toHaveLength(2);
    });
  });
});
