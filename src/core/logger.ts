/**
 * Skyhand Agent — Logging
 *
 * Event-style structured logging on top of the console:
 *
 *   logger.info('command_started', { name: 'takeoff', attempt: 1 })
 *   2026-05-01T10:00:00.000Z INFO  [runner] command_started name=takeoff attempt=1
 *
 * Components take a Logger and never reach for the console directly.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  /** Logger for a sub-component, e.g. `runner` → `runner:failsafe`. */
  child(scope: string): Logger;
}

/** Where formatted lines go. Defaults to the matching console method. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  clock?: () => Date;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') {
    return /[\s="]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  return JSON.stringify(value);
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel,
    private readonly sink: LogSink,
    private readonly clock: () => Date,
  ) {}

  debug(event: string, fields?: LogFields): void {
    this.write('debug', event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.write('info', event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.write('warn', event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.write('error', event, fields);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level, this.sink, this.clock);
  }

  private write(level: LogLevel, event: string, fields?: LogFields): void {
    if (RANK[level] < RANK[this.level]) return;
    const tail = fields ? formatFields(fields) : '';
    const head = `${this.clock().toISOString()} ${level.toUpperCase().padEnd(5)} [${this.scope}] ${event}`;
    this.sink(level, tail ? `${head} ${tail}` : head);
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(
    scope,
    options.level ?? 'info',
    options.sink ?? consoleSink,
    options.clock ?? (() => new Date()),
  );
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
