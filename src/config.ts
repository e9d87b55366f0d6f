/**
 * Runtime configuration, read once from the environment.
 * `.env` is loaded by the server entry point before this runs.
 */

import { ConfigError } from './errors.js';
import type { LogLevel } from './providers/ILogProvider.js';

export interface AppConfig {
  databasePath: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  /** Empty string disables the file log. */
  logFile: string;
  maxMessageLength: number;
  maxBodyBytes: number;
  dbBusyTimeoutMs: number;
  dbWriteTimeoutMs: number;
  collectDefaultMetrics: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    databasePath: env.DATABASE_PATH ?? 'data/feedback.db',
    host: env.HOST ?? '0.0.0.0',
    port: readInt(env, 'PORT', 8090, { min: 0, max: 65535 }),
    logLevel: readLogLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE ?? 'logs/app.log',
    maxMessageLength: readInt(env, 'MAX_MESSAGE_LENGTH', 500, { min: 1 }),
    maxBodyBytes: readInt(env, 'MAX_BODY_BYTES', 50 * 1024, { min: 1 }),
    dbBusyTimeoutMs: readInt(env, 'DB_BUSY_TIMEOUT_MS', 5000, { min: 0 }),
    dbWriteTimeoutMs: readInt(env, 'DB_WRITE_TIMEOUT_MS', 5000, { min: 1 }),
    collectDefaultMetrics: readBool(env, 'METRICS_DEFAULT', true),
  };
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  bounds: { min?: number; max?: number }
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }

  const value = Number(raw);
  if (bounds.min !== undefined && value < bounds.min) {
    throw new ConfigError(`${name} must be at least ${bounds.min}`);
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new ConfigError(`${name} must be at most ${bounds.max}`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readLogLevel(raw: string | undefined): LogLevel {
  const level = (raw ?? 'info').trim().toLowerCase();
  const match = LOG_LEVELS.find((l) => l === level);
  if (!match) {
    throw new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}
