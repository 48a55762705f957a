export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Console logger with a minimum level.
 *
 * Writes through console.* so the run log mirror (unified-logging) sees it.
 */
export class Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(`[debug] ${message}`, ...meta);
    }
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled('info')) {
      console.log(message, ...meta);
    }
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(`[warn] ${message}`, ...meta);
    }
  }

  error(message: string, ...meta: unknown[]): void {
    if (this.enabled('error')) {
      console.error(`[error] ${message}`, ...meta);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
