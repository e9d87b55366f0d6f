/**
 * Fans every event out to several providers (e.g. stdout and a file).
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export class MultiLogProvider implements ILogProvider {
  constructor(private readonly providers: ILogProvider[]) {}

  log(event: LogEvent): void {
    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    for (const provider of this.providers) {
      provider.log(stamped);
    }
  }

  async flush(): Promise<void> {
    await Promise.all(this.providers.map((p) => p.flush()));
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
}
