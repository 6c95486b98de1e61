/**
 * Logger utility with configurable log levels
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

const LEVEL_NAMES: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  /** Minimum log level (default: 'silent') */
  level?: LogLevel;
  /** Prefix for all log messages */
  prefix?: string;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Custom log handler (default: console) */
  handler?: LogHandler;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
  prefix?: string;
  /** Instrument endpoint the entry relates to, e.g. "192.168.1.40:5555" or "/dev/ttyACM0" */
  endpoint?: string;
}

export type LogHandler = (entry: LogEntry) => void;

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHOD: Record<Exclude<LogLevel, 'silent'>, ConsoleMethod> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

/** Resolves the effective level: an explicit level wins over the debug flag */
export function resolveLogLevel(level?: LogLevel, debug?: boolean): LogLevel {
  return level ?? (debug ? 'debug' : 'silent');
}

const defaultHandler: LogHandler = (entry) => {
  if (entry.level === 'silent') return;
  const line = [
    entry.timestamp,
    entry.prefix ? `[${entry.prefix}]` : '',
    entry.endpoint ? `<${entry.endpoint}>` : '',
    entry.level.toUpperCase(),
    entry.message,
  ]
    .filter(Boolean)
    .join(' ');

  const method = CONSOLE_METHOD[entry.level];
  if (entry.data !== undefined) {
    console[method](line, entry.data);
  } else {
    console[method](line);
  }
};

export class Logger {
  private level: number;
  private prefix?: string;
  private timestamps: boolean;
  private handler: LogHandler;
  private endpoint?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = LOG_LEVELS[options.level ?? 'silent'];
    this.prefix = options.prefix;
    this.timestamps = options.timestamps ?? true;
    this.handler = options.handler ?? defaultHandler;
  }

  /** Create a child logger with additional prefix */
  child(prefix: string): Logger {
    const childLogger = new Logger({
      level: this.getLevelName(),
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamps: this.timestamps,
      handler: this.handler,
    });
    childLogger.endpoint = this.endpoint;
    return childLogger;
  }

  /** Tag subsequent entries with the instrument endpoint */
  setEndpoint(endpoint: string): void {
    this.endpoint = endpoint;
  }

  getLevelName(): LogLevel {
    return LEVEL_NAMES.find((name) => LOG_LEVELS[name] === this.level) ?? 'silent';
  }

  setLevel(level: LogLevel): void {
    this.level = LOG_LEVELS[level];
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.level;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    this.handler({
      level,
      message,
      data,
      timestamp: this.timestamps ? new Date().toISOString() : '',
      prefix: this.prefix,
      endpoint: this.endpoint,
    });
  }

  trace(message: string, data?: unknown): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }
}
