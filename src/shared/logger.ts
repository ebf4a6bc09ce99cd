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
    this.log(LogLevel.WARN, message, describeError(data));
  }

  error(message: string, error?: unknown): void {
    this.log(LogLevel.ERROR, message, describeError(error));
  }

  /**
   * Create a logger for a sub-component sharing this logger's level
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.minLevel);
  }
}

function describeError(value: unknown): unknown {
  if (!(value instanceof Error)) return value;

  const code = 'code' in value ? value.code : undefined;
  return {
    name: value.name,
    message: value.message,
    ...(code !== undefined ? { code } : {}),
    stack: value.stack,
  };
}

/**
 * Parse a LOG_LEVEL value, falling back when it is missing or unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

export function createLogger(context: string): Logger {
  return new Logger(context, parseLogLevel(process.env.LOG_LEVEL));
}
