/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes each event to stdout as one JSON line.
 */

import {
  formatJsonLine,
  LOG_LEVEL_RANK,
  type ILogProvider,
  type LogEvent,
  type LogLevel,
} from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to stdout as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Keep events in `events`. Default: true. Turn off for long-running processes. */
  retainEvents?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;
  private readonly retainEvents: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minRank = LOG_LEVEL_RANK[options?.minLevel ?? 'debug'];
    this.retainEvents = options?.retainEvents ?? true;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_RANK[event.level] < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    if (this.retainEvents) {
      this.events.push(stamped);
    }

    if (this.outputToConsole) {
      process.stdout.write(`${formatJsonLine(stamped)}\n`);
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush; events are synchronous.
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

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
