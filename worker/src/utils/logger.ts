import type { Logger } from '@flowgraph/component-sdk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  context: string;
  message: string;
  data: unknown[];
}

export type LogSink = (entry: LogEntry) => void;

export interface WorkerLoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export const consoleSink: LogSink = (entry) => {
  const line = `[${entry.timestamp}] [${entry.level}] [${entry.context}] ${entry.message}`;
  const rest = entry.data.map(formatArg);
  if (entry.level === 'error') {
    console.error(line, ...rest);
  } else if (entry.level === 'warn') {
    console.warn(line, ...rest);
  } else {
    console.log(line, ...rest);
  }
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Context-tagged logger for the worker. Entries below the configured level are
 * dropped; everything else goes to the sink (console by default).
 */
export class WorkerLogger implements Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(
    private readonly context: string,
    options: WorkerLoggerOptions = {},
  ) {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    this.level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
    this.sink = options.sink ?? consoleSink;
  }

  child(context: string): WorkerLogger {
    return new WorkerLogger(`${this.context}:${context}`, { level: this.level, sink: this.sink });
  }

  debug(...args: unknown[]): void {
    this.write('debug', args);
  }

  info(...args: unknown[]): void {
    this.write('info', args);
  }

  warn(...args: unknown[]): void {
    this.write('warn', args);
  }

  error(...args: unknown[]): void {
    this.write('error', args);
  }

  private write(level: LogLevel, args: unknown[]): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }
    const [first, ...data] = args;
    this.sink({
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message: formatArg(first ?? ''),
      data,
    });
  }
}

export function createLogger(context: string, options?: WorkerLoggerOptions): WorkerLogger {
  return new WorkerLogger(context, options);
}
