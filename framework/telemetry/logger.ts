/**
 * Logging
 *
 * Leveled logging with context, as JSON lines or pretty terminal output.
 */

import { Environment } from '../runtime/environment.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Narrow an optional setting (e.g. LOG_LEVEL) to a log level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return value !== undefined && isLogLevel(value) ? value : undefined;
}

/**
 * Render an entry for a terminal
 */
export function formatPretty(entry: LogEntry, colors = true): string {
  const paint = (code: string, text: string) => (colors ? code + text + RESET : text);

  let line = `${paint(DIM, entry.timestamp)} ${paint(
    COLORS[entry.level],
    entry.level.toUpperCase().padEnd(5)
  )} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${paint(DIM, JSON.stringify(entry.context))}`;
  }
  if (entry.error?.stack) {
    line += `\n${paint(DIM, entry.error.stack)}`;
  }

  return line;
}

function describeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

/**
 * Leveled logger
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? ((entry) => this.write(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level. `error` may be anything a catch clause receives.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error !== undefined) {
      entry.error = describeError(error);
    }

    this.output(entry);
  }

  // warn and error go to stderr, the rest to stdout
  private write(entry: LogEntry): void {
    const text = this.format === 'json' ? JSON.stringify(entry) : formatPretty(entry);
    if (LOG_LEVELS[entry.level] >= LOG_LEVELS.warn) {
      console.error(text);
    } else {
      console.log(text);
    }
  }
}

// Default logger instance
let defaultLogger: Logger | null = null;

/**
 * Get the default logger, configured from NODE_ENV and LOG_LEVEL
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = Environment.isProduction();
    defaultLogger = new Logger({
      level: parseLogLevel(Environment.get('LOG_LEVEL')) ?? (production ? 'info' : 'debug'),
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

/**
 * Set the default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
