/**
 * Console logger with a `[soltools]` prefix and a mutable level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export class Logger {
  private level: LogLevel;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info',
  ) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[${this.prefix}]`, ...args);
  }

  info(...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.prefix}]`, ...args);
  }

  warn(...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[${this.prefix}]`, ...args);
  }

  error(...args: unknown[]): void {
    if (this.enabled('error')) console.error(`[${this.prefix}]`, ...args);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

const envLevel = process.env['SOLTOOLS_LOG_LEVEL'];

/** Package-wide logger. */
export const logger = new Logger('soltools', isLogLevel(envLevel) ? envLevel : 'info');
