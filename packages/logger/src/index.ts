export { createLogger, LOG_LEVEL_PRIORITY } from './logger.js';
export { createConsoleSink, createMemorySink, formatJson, formatPretty } from './sinks.js';
export type { MemorySink } from './sinks.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  LogFormat,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
