/**
 * Logging provider interface.
 * Wraps log destinations (stdout, a JSON-lines file, or several at once).
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** A structured log event. */
export interface LogEvent {
  /** Severity level. */
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** Extended event for HTTP request logging. */
export interface RequestLogEvent extends LogEvent {
  /** HTTP method (GET, POST, etc). */
  method: string;
  /** URL path (e.g. /feedback/3). */
  path: string;
  /** Matched route template (e.g. /feedback/:id), if any. */
  route?: string;
  /** HTTP response status code. */
  status: number;
  /** Request duration in milliseconds. */
  durationMs: number;
}

export interface ILogProvider {
  /** Enqueue a structured log event for delivery. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  /* Convenience methods, all non-blocking. */
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

/**
 * Render an event as a single JSON line (no trailing newline).
 * Fields sit beside the event keys; a field whose name is already taken
 * (`message`, `level`, `status`, ...) is written as `field_<name>`.
 */
export function formatJsonLine(event: LogEvent): string {
  const { fields, ...rest } = event;
  const line: Record<string, unknown> = { ...rest };
  for (const [key, value] of Object.entries(fields ?? {})) {
    line[Object.hasOwn(line, key) ? `field_${key}` : key] = value;
  }
  return JSON.stringify(line);
}
