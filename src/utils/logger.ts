export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

export function parseLogLevel(name: string | undefined, fallback: LogLevel): LogLevel {
  if (!name) {
    return fallback;
  }
  return LEVEL_NAMES[name.toLowerCase()] ?? fallback;
}

class Logger {
  private readonly level: LogLevel = parseLogLevel(
    process.env.LOG_LEVEL,
    process.env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG
  );

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.log(`[DEBUG] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(`[INFO] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  performance(operation: string, duration: number, threshold: number = 1000): void {
    if (duration > threshold) {
      this.warn(`${operation} took ${duration}ms - this is slow!`);
    } else {
      this.debug(`${operation} took ${duration}ms`);
    }
  }
}

export const logger = new Logger();
