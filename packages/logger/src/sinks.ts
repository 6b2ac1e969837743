/** Built-in log sinks */

import chalk from 'chalk';
import type { LogEntry, LogFormat, LogLevel, LogSink } from './types.js';

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: (s: string) => chalk.bold(chalk.red(s)),
};

/**
 * Render an entry as a single human-readable block.
 *
 * The message wins over the event type; metadata is only appended when there
 * is no message to show.
 */
export function formatPretty(entry: LogEntry, color = true): string {
  const paint = color ? LEVEL_COLORS[entry.level] : (s: string) => s;
  const label = paint(entry.level.toUpperCase().padEnd(5));

  if (entry.message !== undefined) {
    return `${label} ${entry.message}`;
  }

  const keys = Object.keys(entry.metadata);
  const details = keys.length > 0 ? ` ${JSON.stringify(entry.metadata)}` : '';
  return `${label} ${entry.event_type}${details}`;
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    event_type: entry.event_type,
    message: entry.message,
    metadata: entry.metadata,
    timestamp: new Date(entry.timestamp).toISOString(),
  });
}

/**
 * Console sink. Errors and fatals go to stderr, the rest to stdout.
 */
export function createConsoleSink(format: LogFormat = 'json'): LogSink {
  return {
    write(entry: LogEntry): void {
      const line = format === 'pretty' ? formatPretty(entry) : formatJson(entry);
      if (entry.level === 'error' || entry.level === 'fatal') {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  };
}

export interface MemorySink extends LogSink {
  readonly entries: LogEntry[];
  clear(): void;
}

/** Keeps every entry in memory, in order of arrival */
export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    entries,
    write(entry: LogEntry): void {
      entries.push(entry);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}
