/**
 * Structured Logging Utility
 * Colorized single-line console logger with JSON metadata
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogMeta = Record<string, unknown>;

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.gray,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

/**
 * Map a raw LOG_LEVEL value to a known level, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? LogLevel.INFO;
}

class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: parseLogLevel(process.env.LOG_LEVEL),
      enableColors: process.env.NODE_ENV !== 'production',
      enableTimestamp: true,
      ...config,
    };
  }

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  /**
   * Build "<timestamp> <LEVEL> <message> <meta-json>"
   */
  formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.colorize(JSON.stringify(meta), colors.gray));
    }

    return parts.join(' ');
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const line = this.formatMessage(level, message, meta);

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging. Error instances are flattened to name/message/stack.
   */
  error(message: string, error?: unknown, meta: LogMeta = {}): void {
    const payload: LogMeta = { ...meta };

    if (error instanceof Error) {
      payload.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      payload.error = error;
    }

    this.log(LogLevel.ERROR, message, payload);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

export const logger = new Logger();

// Export for testing
export { Logger };
