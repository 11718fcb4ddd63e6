/**
 * Shared logger for Fusion services.
 * Every level goes to stderr: stdout belongs to the MCP JSON-RPC stream and to program output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const VALID_LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

/** Destination for formatted lines. Defaults to console.error. */
export type LogSink = (line: string) => void;

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
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

function levelFromEnv(): LogLevel {
  const envLevel = process.env.FUSION_LOG_LEVEL ?? process.env.LOG_LEVEL;
  return isValidLogLevel(envLevel) ? envLevel : 'info';
}

export class Logger {
  private level: LogLevel;
  private readonly context: string;
  private sink: LogSink;

  constructor(context: string = 'fusion', sink?: LogSink) {
    this.context = context;
    this.level = levelFromEnv();
    this.sink = sink ?? ((line) => console.error(line));
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      line += ` ${JSON.stringify(data, errorReplacer)}`;
    }
    this.sink(line);
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

  /**
   * Child logger with `parent:child` context, sharing level and sink.
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

  /** Redirect output, e.g. to capture lines in tests. */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }
}

/** Default logger instance */
export const logger = new Logger();
