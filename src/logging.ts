/**
 * Logging for request dispatch.
 *
 * The client logs through the {@link Logger} interface and stays silent by
 * default. {@link ConsoleLogger} writes one line per event and never prints
 * credentials: sensitive keys are masked and URLs lose their userinfo.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Context keys the dispatcher emits. Other keys pass through as given.
 */
export interface LogContext {
  method?: string;
  url?: string;
  attempt?: number;
  hop?: number;
  status?: number;
  kind?: string;
  delayMs?: number;
  requestId?: string;
  [key: string]: unknown;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const SENSITIVE_KEYS = new Set([
  'authorization',
  'token',
  'jwt',
  'privatekey',
  'private_key',
  'secret',
  'password',
]);

const REDACTED = '[REDACTED]';

/**
 * Drops `user:password@` from anything that parses as an absolute URL.
 */
function stripUserinfo(value: string): string {
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) return value;
  try {
    const url = new URL(value);
    if (url.username === '' && url.password === '') return value;
    url.username = '';
    url.password = '';
    return url.toString();
  } catch {
    return value;
  }
}

function redact(value: unknown, key?: string): unknown {
  if (key !== undefined && SENSITIVE_KEYS.has(key.toLowerCase())) return REDACTED;
  if (typeof value === 'string') return stripUserinfo(value);
  if (Array.isArray(value)) return value.map((item) => redact(item));
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, redact(v, k)]));
  }
  return value;
}

export interface ConsoleLoggerOptions {
  /** Lowest level written. Defaults to `info`. */
  level?: LogLevel;
  /** `text` (default) or one JSON object per line. */
  format?: 'text' | 'json';
  /** Fields merged into every line. */
  context?: LogContext;
  timestamps?: boolean;
  write?: (line: string) => void;
}

export class ConsoleLogger implements Logger {
  private readonly minimum: number;
  private readonly format: 'text' | 'json';
  private readonly context: LogContext;
  private readonly timestamps: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minimum = LEVELS.indexOf(options.level ?? 'info');
    this.format = options.format ?? 'text';
    this.context = options.context ?? {};
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? ((line) => console.error(line));
  }

  /**
   * Returns a logger that adds `context` to every line.
   */
  child(context: LogContext): ConsoleLogger {
    return new ConsoleLogger({
      level: LEVELS[this.minimum],
      format: this.format,
      context: { ...this.context, ...context },
      timestamps: this.timestamps,
      write: this.write,
    });
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVELS.indexOf(level) < this.minimum) return;

    const fields = Object.entries({ ...this.context, ...context })
      .filter(([, value]) => value !== undefined)
      .map(([key, value]): [string, unknown] => [key, redact(value, key)]);
    const time = this.timestamps ? new Date().toISOString() : undefined;

    if (this.format === 'json') {
      this.write(JSON.stringify({ time, level, message, ...Object.fromEntries(fields) }));
      return;
    }

    const pairs = fields.map(([key, value]) =>
      `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
    );
    const head = time ? `${time} ${level.toUpperCase()}` : level.toUpperCase();
    this.write([head, message, ...pairs].join(' '));
  }
}

/**
 * Discards everything. The client default.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
