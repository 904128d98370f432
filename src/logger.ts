export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export class Logger {
  private context: string;
  private minLevel: LogLevel;

  constructor(context: string, minLevel: LogLevel = LogLevel.INFO) {
    this.context = context;
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.minLevel) return;

    const formattedMessage = `[${this.context}] ${message}`;
    const payload = data ?? '';

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, payload);
        break;
      case LogLevel.INFO:
        console.log(formattedMessage, payload);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, payload);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, payload);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown): void {
    const errorData = error instanceof Error ? {
      name: error.name,
      message: error.message,
      stack: error.stack,
    } : error;
    this.log(LogLevel.ERROR, message, errorData);
  }
}

/**
 * Parse a level name such as "debug" or "WARN".
 * Returns undefined for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

export function createLogger(context: string): Logger {
  // SIM_LOG_LEVEL lets a host turn on per-tick diagnostics without code changes
  const minLevel = parseLogLevel(process.env.SIM_LOG_LEVEL) ?? LogLevel.INFO;
  return new Logger(context, minLevel);
}
