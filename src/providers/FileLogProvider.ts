/**
 * JSON-lines file log provider.
 * Buffers events and appends them to a file in batches.
 * Non-blocking; a failed append keeps the batch for the next flush.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  formatJsonLine,
  LOG_LEVEL_RANK,
  type ILogProvider,
  type LogEvent,
  type LogLevel,
} from './ILogProvider.js';

export interface FileLogProviderOptions {
  /** Destination file. Parent directories are created on first flush. */
  filePath: string;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 1_000. 0 disables. */
  flushIntervalMs?: number;
}

export class FileLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly filePath: string;
  private readonly minRank: number;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private pending: Promise<void> = Promise.resolve();
  private directoryReady = false;
  private warned = false;

  constructor(options: FileLogProviderOptions) {
    this.filePath = options.filePath;
    this.minRank = LOG_LEVEL_RANK[options.minLevel ?? 'debug'];
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 1_000;

    if (this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  /** Number of events waiting to be written. */
  get buffered(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_RANK[event.level] < this.minRank) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    });

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /** Flushes are chained so batches land in the file in logging order. */
  flush(): Promise<void> {
    this.pending = this.pending.then(() => this.writeBatch());
    return this.pending;
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  private async writeBatch(): Promise<void> {
    if (this.buffer.length === 0) return;

    const batch = [...this.buffer];
    const text = batch.map((e) => `${formatJsonLine(e)}\n`).join('');

    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.filePath), { recursive: true });
        this.directoryReady = true;
      }
      await appendFile(this.filePath, text, 'utf8');
      // Only clear the events that were in this batch
      this.buffer.splice(0, batch.length);
    } catch (err) {
      // Events retained for retry on next flush; report the first failure only
      if (!this.warned) {
        this.warned = true;
        process.stderr.write(
          `log file ${this.filePath} is not writable: ${err instanceof Error ? err.message : String(err)}\n`
        );
      }
    }
  }
}
