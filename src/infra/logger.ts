/**
 * Structured logger.
 * One line per entry: timestamp, level, message and a JSON context.
 * Context keys that look like credentials are redacted before formatting.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

const REDACT_KEY_PATTERNS: ReadonlyArray<RegExp> = [
  /^authorization$/i,
  /^cookie$/i,
  /token/i,
  /secret/i,
  /password/i,
  /hash/i,
];

const MAX_DEPTH = 4;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function redact(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) {
    return '[Truncated depth]';
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = REDACT_KEY_PATTERNS.some((re) => re.test(key))
        ? '[REDACTED]'
        : redact(inner, depth + 1);
    }
    return out;
  }
  return value;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) {
      console.log(this.format('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error | LogContext): void {
    if (!this.enabled('error')) {
      return;
    }
    const context =
      error instanceof Error
        ? { error: error.message, name: error.name, stack: error.stack }
        : error;
    console.error(this.format('error', message, context));
  }

  format(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(redact(context))}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
