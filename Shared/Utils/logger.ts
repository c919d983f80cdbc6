/**
 * Shared logger for the notifier packages.
 *
 * Lines look like `[ISO_TIMESTAMP] [LEVEL] [context] message {json}`.
 * debug/info go to stdout, warn/error to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const VALID_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isValidLogLevel(value: string | undefined): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

export type LogSink = (level: LogLevel, line: string) => void;

const defaultSink: LogSink = (level, line) => {
  if (level === 'warn' || level === 'error') {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
};

export class Logger {
  private level: LogLevel;
  private context: string;
  private sink: LogSink;

  constructor(context: string = 'notifier', sink: LogSink = defaultSink) {
    this.context = context;
    this.sink = sink;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(envLevel) ? envLevel : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(level, this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a child logger with additional context.
   * The child shares the parent's sink and starts at the parent's level.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`, this.sink);
    child.level = this.level;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Default logger instance */
export const logger = new Logger();
