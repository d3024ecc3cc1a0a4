/**
 * Structured Logging for courier
 *
 * Pretty, coloured lines for humans reading a CI log and one JSON object per
 * line when LOG_FORMAT=json. Level and format come from configuration.
 */

import { isColorEnabled } from './colors';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'pretty' | 'json';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerContext {
  service?: string;
  [key: string]: unknown;
}

/** Receives every formatted line that passes the level filter */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
  /** ANSI colours in pretty lines. Defaults to the terminal's support. */
  color?: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

// ANSI color codes for pretty printing
const ansi = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
};

const levelColors: Record<LogLevel, string> = {
  debug: ansi.dim,
  info: ansi.cyan,
  warn: ansi.yellow,
  error: ansi.red,
  fatal: ansi.magenta,
};

// =============================================================================
// Formatters
// =============================================================================

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry, color: boolean): string {
  const { level, message, timestamp, service, duration, ...rest } = entry;
  const paint = (code: string, text: string): string => (color ? `${code}${text}${ansi.reset}` : text);

  const time = new Date(timestamp).toLocaleTimeString();

  let output = `${paint(ansi.dim, time)} ${paint(levelColors[level], `[${level.toUpperCase()}]`)}`;

  if (service) {
    output += ` ${paint(ansi.blue, `[${service}]`)}`;
  }

  output += ` ${message}`;

  if (duration !== undefined) {
    output += ` ${paint(ansi.dim, `(${duration}ms)`)}`;
  }

  const extras = Object.entries(rest).filter(([_, v]) => v !== undefined);
  if (extras.length > 0) {
    const extraStr = extras.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
    output += ` ${paint(ansi.dim, extraStr)}`;
  }

  return output;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
    case 'fatal':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private context: LoggerContext;
  private minLevel: number;
  private format: LogFormat;
  private sink: LogSink;
  private color: boolean;

  constructor(context: LoggerContext = {}, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = LOG_LEVELS[options.level ?? 'info'];
    this.format = options.format ?? 'pretty';
    this.sink = options.sink ?? consoleSink;
    this.color = options.color ?? isColorEnabled();
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LoggerContext): Logger {
    const child = new Logger({ ...this.context, ...context });
    child.minLevel = this.minLevel;
    child.format = this.format;
    child.sink = this.sink;
    child.color = this.color;
    return child;
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < this.minLevel) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...meta,
    };

    this.sink(level, this.format === 'json' ? formatJson(entry) : formatPretty(entry, this.color));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log('fatal', message, meta);
  }

  /**
   * Create a timer that logs on completion
   */
  startTimer(message: string, meta?: Record<string, unknown>): { end: () => void } {
    const start = Date.now();
    return {
      end: () => {
        this.info(message, { ...meta, duration: Date.now() - start });
      },
    };
  }
}

/**
 * Logger that drops everything, for library callers that pass none
 */
export function silentLogger(): Logger {
  return new Logger({}, { level: 'fatal', sink: () => undefined });
}

export const logger = new Logger({ service: 'courier' });
