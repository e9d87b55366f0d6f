export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { FileLogProvider } from './FileLogProvider.js';
export { MultiLogProvider } from './MultiLogProvider.js';
export type {
  IMetricsProvider,
  OperationMetricEvent,
  RequestMetricEvent,
} from './IMetricsProvider.js';
export { PrometheusMetricsProvider } from './PrometheusMetricsProvider.js';
