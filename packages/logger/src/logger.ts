/** Structured logger with pluggable sinks */

import { createConsoleSink } from './sinks.js';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
  },
};

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

interface ResolvedConfig {
  sink: LogSink;
  minLevel: LogLevel;
  includeStackTraces: boolean;
}

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private config: ResolvedConfig;

  constructor(config: ResolvedConfig, parentMetadata: Record<string, unknown> = {}) {
    this.config = config;
    this.metadata = parentMetadata;
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(this.config, { ...this.metadata, ...metadata });
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    const { message, ...rest } = { ...this.metadata, ...metadata };
    if (!this.config.includeStackTraces) {
      delete rest.stack;
    }

    const entry: LogEntry = {
      id: this.generateId(),
      level,
      event_type,
      metadata: rest,
      timestamp: Date.now(),
    };
    if (typeof message === 'string') {
      entry.message = message;
    } else if (message !== undefined) {
      entry.metadata.message = message;
    }

    this.config.sink.write(entry);
  }

  protected generateId(): string {
    // Simple ID generation: timestamp + random suffix
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 9);
    return `log_${timestamp}_${random}`;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const envConfig = ENVIRONMENT_CONFIGS[config.environment ?? 'development'];

  return new LoggerImpl({
    sink: config.sink ?? createConsoleSink(config.format ?? 'json'),
    minLevel: config.minLevel ?? envConfig.minLevel,
    includeStackTraces: envConfig.includeStackTraces,
  });
}
