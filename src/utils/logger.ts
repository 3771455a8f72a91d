/**
 * Structured Logger
 * One JSON object per line, shared by every repository and service
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  requestId?: string;
  userId?: number;
  orderId?: number;
  [key: string]: unknown;
}

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toUpperCase();
  return LEVELS.find((level) => level === value) ?? LogLevel.INFO;
}

class Logger {
  private context: LogContext = {};
  private logLevel: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.logLevel = level;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, data);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, data);
    }
  }

  /**
   * Error level logging; Error instances are flattened to name/message/stack
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData =
        error instanceof Error
          ? {
              name: error.name,
              message: error.message,
              stack: error.stack,
              ...data,
            }
          : { error, ...data };

      this.log(LogLevel.ERROR, message, errorData);
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...(data && { data }),
    };

    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(JSON.stringify(logEntry));
        break;
      case LogLevel.WARN:
        console.warn(JSON.stringify(logEntry));
        break;
      case LogLevel.ERROR:
        console.error(JSON.stringify(logEntry));
        break;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.logLevel);
    childLogger.context = { ...this.context, ...context };
    return childLogger;
  }
}

export const logger = new Logger();

export { Logger };

/**
 * Usage:
 *
 * const orderLogger = logger.child({ orderId: 12 });
 * orderLogger.info('Status changed', { from: 'WAIT_PAYMENT', to: 'PAID' });
 *
 * try {
 *   await ledger.submitProof(12, userId, fileId);
 * } catch (error) {
 *   logger.error('Failed to record payment proof', error, { orderId: 12 });
 * }
 */
