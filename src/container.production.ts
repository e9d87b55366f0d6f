/**
 * Production container: SQLite file store, stdout + file logging,
 * Prometheus metrics. The database handle is opened here and handed back
 * so the entry point can close it on shutdown.
 */

import { createContainer, type Container } from './container.js';
import type { AppConfig } from './config.js';
import { closeDatabase, openDatabase } from './db.js';
import { SqliteFeedbackRepository } from './repositories/SqliteFeedbackRepository.js';
import {
  ConsoleLogProvider,
  FileLogProvider,
  MultiLogProvider,
  PrometheusMetricsProvider,
  type ILogProvider,
} from './providers/index.js';

export interface ProductionContainer {
  container: Container;
  /** Flush logs and release the database handle. Safe to call twice. */
  dispose(): Promise<void>;
}

export function createProductionContainer(config: AppConfig): ProductionContainer {
  const consoleLog = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: config.logLevel,
    retainEvents: false,
  });
  const fileLog = config.logFile
    ? new FileLogProvider({ filePath: config.logFile, minLevel: config.logLevel })
    : null;
  const logProvider: ILogProvider = fileLog
    ? new MultiLogProvider([consoleLog, fileLog])
    : consoleLog;

  logProvider.info('Logging configured', {
    logLevel: config.logLevel,
    logFile: config.logFile || null,
  });

  const db = openDatabase(config.databasePath, { busyTimeoutMs: config.dbBusyTimeoutMs });
  const feedbackRepo = new SqliteFeedbackRepository(db, {
    writeTimeoutMs: config.dbWriteTimeoutMs,
  });
  logProvider.info('Database initialized', { databasePath: config.databasePath });

  const container = createContainer({
    feedbackRepo,
    logProvider,
    metricsProvider: new PrometheusMetricsProvider({
      collectDefaults: config.collectDefaultMetrics,
    }),
    maxMessageLength: config.maxMessageLength,
    maxBodyBytes: config.maxBodyBytes,
  });

  let disposed = false;
  const dispose = async (): Promise<void> => {
    if (disposed) return;
    disposed = true;
    closeDatabase(db);
    if (fileLog) {
      await fileLog.dispose();
    }
    await logProvider.flush();
  };

  return { container, dispose };
}
