/**
 * Hook Logger
 * Level-filtered log lines for the install and configure hooks. Lines go to
 * stderr so snapctl and the hook runtime keep stdout to themselves.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const upper = value.trim().toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
}

export class Logger {
  private entries: LogEntry[] = [];

  constructor(
    private minLevel: LogLevel = LogLevel.INFO,
    private sink: LogSink = line => console.error(line)
  ) {}

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  log(level: LogLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      stack: error?.stack,
      context
    };
    this.entries.push(entry);
    this.output(entry);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, error, context);
  }

  getEntries(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.entries.filter(entry => entry.level === level);
    }
    return this.entries;
  }

  private output(entry: LogEntry): void {
    const suffix = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    this.sink(`[${entry.timestamp.toISOString()}] ${entry.level}: ${entry.message}${suffix}`);
    if (entry.stack && LEVEL_ORDER[this.minLevel] <= LEVEL_ORDER[LogLevel.DEBUG]) {
      this.sink(entry.stack);
    }
  }
}
