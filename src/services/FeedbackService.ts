/**
 * Feedback resource manager.
 * Composes validation and storage into one CRUD contract, stamps timestamps,
 * and records an operation counter and duration for every call.
 */

import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { FeedbackRow } from '../types/database.js';
import type { Feedback, FeedbackOperation, OperationOutcome } from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { FeedbackValidator } from './FeedbackValidator.js';

export type Clock = () => Date;

export interface DeleteResult {
  id: number;
  deleted: true;
}

export class FeedbackService {
  constructor(
    private readonly feedbackRepo: IFeedbackRepository,
    private readonly validator: FeedbackValidator,
    private readonly metrics: IMetricsProvider,
    private readonly logger: ILogProvider,
    private readonly clock: Clock = () => new Date()
  ) {}

  async create(raw: unknown): Promise<Feedback> {
    return this.instrument('create', async () => {
      const message = this.validator.validate(raw);
      const now = this.clock().toISOString();

      const row = await this.feedbackRepo.insert({
        message,
        created_at: now,
        updated_at: now,
      });

      this.metrics.recordCreated();
      this.logger.info('Feedback created', { feedbackId: row.id });
      return this.rowToFeedback(row);
    });
  }

  async getById(id: number): Promise<Feedback> {
    return this.instrument('get', async () => {
      const row = Number.isSafeInteger(id) ? await this.feedbackRepo.findById(id) : null;
      if (!row) {
        throw new NotFoundError();
      }
      return this.rowToFeedback(row);
    });
  }

  /** All records, ordered by id ascending. */
  async list(): Promise<Feedback[]> {
    return this.instrument('list', async () => {
      const rows = await this.feedbackRepo.findAll();
      return rows.map((row) => this.rowToFeedback(row));
    });
  }

  /** Validates before looking the record up, so a bad body on a missing id is a 400. */
  async update(id: number, raw: unknown): Promise<Feedback> {
    return this.instrument('update', async () => {
      const message = this.validator.validate(raw);

      const row = Number.isSafeInteger(id)
        ? await this.feedbackRepo.update(id, message, this.clock().toISOString())
        : null;
      if (!row) {
        throw new NotFoundError();
      }

      this.logger.info('Feedback updated', { feedbackId: row.id });
      return this.rowToFeedback(row);
    });
  }

  async delete(id: number): Promise<DeleteResult> {
    return this.instrument('delete', async () => {
      const deleted = Number.isSafeInteger(id) && (await this.feedbackRepo.delete(id));
      if (!deleted) {
        throw new NotFoundError();
      }

      this.logger.info('Feedback deleted', { feedbackId: id });
      return { id, deleted: true };
    });
  }

  /** Number of present records. Not instrumented as a CRUD operation. */
  async count(): Promise<number> {
    return this.feedbackRepo.count();
  }

  // ── Private ──

  /**
   * Time `fn`, classify how it ended, and record both before the result
   * (or the unchanged error) reaches the caller.
   */
  private async instrument<T>(operation: FeedbackOperation, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    let outcome: OperationOutcome = 'success';

    try {
      return await fn();
    } catch (err) {
      outcome = this.classify(err);
      if (outcome === 'storage_error') {
        this.logger.error(`Feedback ${operation} failed`, {
          error: err instanceof Error ? err.message : String(err),
          cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
        });
      }
      throw err;
    } finally {
      this.metrics.recordOperation({
        operation,
        outcome,
        durationMs: performance.now() - start,
      });
    }
  }

  private classify(err: unknown): OperationOutcome {
    if (err instanceof ValidationError) return 'validation_error';
    if (err instanceof NotFoundError) return 'not_found';
    return 'storage_error';
  }

  private rowToFeedback(row: FeedbackRow): Feedback {
    return {
      id: row.id,
      message: row.message,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
