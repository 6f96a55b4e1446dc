/**
 * Structured JSON logger.
 * Output goes to stdout where Cloud Functions picks it up as structured logs.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? 'info';
}

// A warm instance keeps only the most recent entries
export const MAX_BUFFERED_LOGS = 1000;

export class Logger {
  private logs: LogEntry[] = [];

  constructor(
    private minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL),
    private readonly maxEntries: number = MAX_BUFFERED_LOGS
  ) {}

  debug(message: string, context: LogContext = {}): void {
    this.log('debug', message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log('info', message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log('warn', message, context);
  }

  error(message: string, context: LogContext = {}): void {
    this.log('error', message, context);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private log(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      context,
      timestamp: new Date().toISOString(),
    };

    console.log(JSON.stringify(entry));

    // Kept for assertions in tests
    this.logs.push(entry);
    if (this.logs.length > this.maxEntries) {
      this.logs.splice(0, this.logs.length - this.maxEntries);
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  clearLogs(): void {
    this.logs = [];
  }
}

export const logger = new Logger();
