/**
 * Shared logger for the sandbox services.
 *
 * Everything goes to stderr: stdout belongs to the MCP JSON-RPC stream.
 * Set LOG_FORMAT=json for one JSON object per line (log shippers),
 * anything else gives the bracketed text format.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * JSON replacer for Error objects, whose own properties are non-enumerable.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { name: value.name, message: value.message };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value && value.code !== undefined) obj.code = value.code;
    return obj;
  }
  return value;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: string;

  constructor(context: string = 'sandbox') {
    this.context = context;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isLogLevel(envLevel) ? envLevel : 'info';
    this.format = process.env.LOG_FORMAT === 'json' ? 'json' : 'text';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      const entry: Record<string, unknown> = {
        ts: timestamp,
        level,
        context: this.context,
        message,
      };
      if (data !== undefined) entry.data = data;
      return JSON.stringify(entry, errorReplacer);
    }

    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, data));
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
   * Child logger whose context is `parent:context`. Level and format are inherited.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`);
    child.level = this.level;
    child.format = this.format;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }
}

/** Default logger instance */
export const logger = new Logger();
