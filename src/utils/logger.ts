/**
 * Structured logger with JSON output and error tracking
 *
 * Module loggers are children of the root logger and follow its level and
 * format unless given their own. `bind` attaches fields such as a run id
 * to every entry a logger writes.
 */

import * as Sentry from '@sentry/node';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogFields = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  module?: string;
  error?: SerializedError;
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const ENTRY_KEYS = new Set(['level', 'message', 'timestamp', 'module', 'error']);

let sentryInitialized = false;

/**
 * Initialize Sentry error tracking; a no-op without a DSN
 */
export function initErrorTracking(dsn?: string, options?: Sentry.NodeOptions): void {
  const sentryDsn = dsn || process.env.SENTRY_DSN;
  if (!sentryDsn || sentryInitialized) {
    return;
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: 1.0,
    ...options,
  });
  sentryInitialized = true;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

function serializeError(error: Error): SerializedError {
  return {
    ...Object.fromEntries(Object.entries(error)),
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function formatPretty(entry: LogEntry, colors: boolean): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const module = entry.module ? `[${entry.module}] ` : '';

  const extra = Object.entries(entry).filter(([key]) => !ENTRY_KEYS.has(key));
  const contextStr = extra.length > 0 ? ` ${JSON.stringify(Object.fromEntries(extra))}` : '';
  const errorStr = entry.error ? `\n${entry.error.stack || `${entry.error.name}: ${entry.error.message}`}` : '';

  if (colors) {
    const dimContext = contextStr ? `${DIM}${contextStr}${RESET}` : '';
    return `${DIM}${entry.timestamp}${RESET} ${COLORS[entry.level]}${levelStr}${RESET} ${module}${entry.message}${dimContext}${errorStr}`;
  }
  return `${entry.timestamp} ${levelStr} ${module}${entry.message}${contextStr}${errorStr}`;
}

export class Logger {
  private level: LogLevel | undefined;
  private format: LogFormat | undefined;
  private useColors: boolean | undefined;

  private constructor(
    private readonly parent: Logger | undefined,
    private readonly module: string,
    private readonly bindings: LogFields
  ) {}

  /**
   * The root logger, configured from LOG_LEVEL / LOG_FORMAT / NODE_ENV
   */
  static root(): Logger {
    const root = new Logger(undefined, '', {});
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    root.level = isLogLevel(envLevel) ? envLevel : 'info';
    root.setFormat(process.env.LOG_FORMAT === 'json' || process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
    return root;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setFormat(format: LogFormat): void {
    this.format = format;
    this.useColors = format !== 'json';
  }

  getFormat(): LogFormat {
    return this.format ?? this.parent?.getFormat() ?? 'pretty';
  }

  setColors(enabled: boolean): void {
    this.useColors = enabled;
  }

  private colorsEnabled(): boolean {
    return this.useColors ?? this.parent?.colorsEnabled() ?? true;
  }

  debug(message: string, context?: LogFields): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogFields): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogFields): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogFields): void {
    this.log('error', message, context);
  }

  /**
   * Logger for a module, nested under this one's module name
   */
  child(module: string): Logger {
    return new Logger(this, this.module ? `${this.module}:${module}` : module, this.bindings);
  }

  /**
   * Same module, with `fields` added to every entry
   */
  bind(fields: LogFields): Logger {
    return new Logger(this, this.module, { ...this.bindings, ...fields });
  }

  /**
   * Flush pending error reports (for graceful shutdown)
   */
  async flush(): Promise<void> {
    if (sentryInitialized) {
      await Sentry.close(2000);
    }
  }

  private log(level: LogLevel, message: string, context?: LogFields): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.getLevel()]) return;

    const { error, ...fields } = { ...this.bindings, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(this.module && { module: this.module }),
      ...fields,
    };

    // Only Error instances carry a stack; anything else is kept as text
    if (error instanceof Error) {
      entry.error = serializeError(error);
    } else if (error !== undefined) {
      entry.errorMessage = describeValue(error);
    }

    const formatted =
      this.getFormat() === 'json'
        ? JSON.stringify(entry)
        : formatPretty(entry, this.colorsEnabled() && process.stdout.isTTY === true);

    switch (level) {
      case 'error':
        console.error(formatted);
        if (sentryInitialized) {
          Sentry.captureException(error instanceof Error ? error : new Error(message), {
            level: 'error',
            tags: { module: this.module || 'root' },
            contexts: { logger: fields },
          });
        }
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }
}

export const logger = Logger.root();

export function createLogger(module: string): Logger {
  return logger.child(module);
}

export { Sentry };
