export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for injectable logging
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console-based logger. Messages below `minLevel` are dropped; everything is
 * written to stderr so compiler output on stdout stays clean.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private prefix?: string,
    private minLevel: LogLevel = 'debug'
  ) {}

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.error(this.format(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.error(this.format(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.error(this.format(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(this.format(message), ...args);
  }
}

/**
 * Silent logger that discards all messages
 */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Create a logger with optional prefix
 */
export function createLogger(prefix?: string, silent = false, minLevel: LogLevel = 'debug'): Logger {
  return silent ? new SilentLogger() : new ConsoleLogger(prefix, minLevel);
}
