import type { ConversionLogger } from '@lineproto-csv/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Destination of formatted lines (default: process.stderr) */
  sink?: LogSink;
  /** Clock used for the `ts` field */
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEY_PATTERN = /^(password|pass|token|apiKey|secret|authorization)$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Replace values of secret-looking keys and flatten errors to plain objects
 */
export function sanitizeLogValue(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(sanitizeLogValue);
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SECRET_KEY_PATTERN.test(k) ? '[REDACTED]' : sanitizeLogValue(v);
    }
    return out;
  }
  return String(value);
}

function formatExtra(extra: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(extra)) {
    if (value === undefined) continue;
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    parts.push(`${key}=${text}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class Logger implements ConversionLogger {
  constructor(private readonly options: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.options.level ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const sink = this.options.sink ?? process.stderr;
    const ts = (this.options.now ?? (() => new Date()))().toISOString();
    const fields = sanitizeLogValue(extra ?? {});
    const safeFields = isPlainObject(fields) ? fields : {};

    if ((this.options.format ?? 'text') === 'json') {
      const record: LogRecord = { ts, level, msg, ...safeFields };
      sink.write(`${JSON.stringify(record)}\n`);
      return;
    }

    sink.write(`[${ts}] ${level.toUpperCase()} ${msg}${formatExtra(safeFields)}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
