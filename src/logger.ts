/**
 * Logger interfaces and implementations
 *
 * Both loggers write to stderr so stdout stays free for decoded output.
 * Param values named in `redactParams` are masked before anything is written.
 */

import { stringify } from 'lossless-json';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Keys inside a `params` context object whose values are masked */
  redactParams?: string[];
}

export const REDACTED = '[REDACTED]';

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.toUpperCase();
  switch (name) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

abstract class BaseLogger implements Logger {
  protected level: LogLevel;
  private redactKeys: Set<string>;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
    this.redactKeys = new Set((options.redactParams ?? []).map(key => key.toLowerCase()));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write(LogLevel.DEBUG, message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write(LogLevel.INFO, message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write(LogLevel.WARN, message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write(LogLevel.ERROR, message, errorContext);
    }
  }

  protected abstract write(level: LogLevel, message: string, context?: Record<string, unknown>): void;

  /**
   * Mask configured keys (case-insensitive) in `context.params`
   */
  protected redact(context: Record<string, unknown>): Record<string, unknown> {
    const params = context.params;
    if (this.redactKeys.size === 0 || !isRecord(params)) return context;

    const masked: Record<string, unknown> = { ...params };
    for (const key of Object.keys(masked)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        masked[key] = REDACTED;
      }
    }
    return { ...context, params: masked };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Default logger - human-readable lines on stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger extends BaseLogger {
  protected write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context ? ` ${stringify(this.redact(context)) ?? ''}` : '';
    console.error(`[${timestamp}] ${LogLevel[level]}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for log aggregation systems
 */
export class JsonLogger extends BaseLogger {
  protected write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level].toLowerCase(),
      message,
      ...(context ? this.redact(context) : undefined),
    };
    console.error(stringify(log));
  }
}
