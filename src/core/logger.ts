export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function resolveLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw ?? '').trim().toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
    ? value
    : fallback;
}

/**
 * Leveled console logger. `child(scope)` returns a logger that prefixes
 * every message with `[scope]` and shares the parent's level.
 */
export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {}

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, meta?: unknown): void {
    if (!this.isEnabled('debug')) return;
    this.write(console.debug, message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (!this.isEnabled('info')) return;
    this.write(console.info, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (!this.isEnabled('warn')) return;
    this.write(console.warn, message, meta);
  }

  error(message: string, meta?: unknown): void {
    if (!this.isEnabled('error')) return;
    this.write(console.error, message, meta);
  }

  private write(sink: (...args: unknown[]) => void, message: string, meta?: unknown): void {
    const line = this.scope ? `[${this.scope}] ${message}` : message;
    if (meta === undefined) {
      sink(line);
      return;
    }
    sink(line, meta);
  }
}

/**
 * Logger for library code that was not handed one. Level follows
 * RESEARCH_LOG_LEVEL, defaulting to warn so embedders are not spammed.
 */
export function defaultLogger(scope?: string): Logger {
  const logger = new Logger(resolveLogLevel(process.env.RESEARCH_LOG_LEVEL, 'warn'));
  return scope ? logger.child(scope) : logger;
}
