/**
 * Logging utility for the yield advisor
 * Provides structured JSON logging with levels and inherited context
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  farmId?: string;
  sessionId?: string;
  predictionId?: string;
  provider?: string;
  functionName?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export type LogData = Record<string, unknown>;

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(level: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const upperLevel = (level ?? '').toUpperCase();
  return LEVEL_ORDER.find((candidate) => candidate === upperLevel) ?? fallback;
}

/**
 * Normalise anything thrown into a loggable shape
 */
export function describeError(error: unknown): LogData {
  if (error instanceof Error) {
    const described: LogData = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) {
      described.cause = describeError(error.cause);
    }
    return described;
  }
  return { message: String(error) };
}

export class Logger {
  private readonly context: LogContext;
  private readonly logLevel: LogLevel;

  constructor(context: LogContext = {}, logLevel: LogLevel = LogLevel.INFO) {
    this.context = context;
    this.logLevel = parseLogLevel(process.env.LOG_LEVEL, logLevel);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      data,
    };

    return JSON.stringify(logEntry);
  }

  debug(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, data));
    }
  }

  info(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, data));
    }
  }

  warn(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, data));
    }
  }

  error(message: string, error?: unknown, data?: LogData): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData: LogData = {
        ...data,
        error: error === undefined ? undefined : describeError(error),
      };
      console.error(this.formatMessage(LogLevel.ERROR, message, errorData));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.logLevel);
  }

  /**
   * Log performance metrics
   */
  performance(operation: string, duration: number, data?: LogData): void {
    this.info(`Performance: ${operation}`, {
      operation,
      duration,
      unit: 'ms',
      ...data,
    });
  }
}

/**
 * Create a logger instance for Lambda functions
 */
export function createLambdaLogger(functionName: string, requestId?: string): Logger {
  return new Logger({
    functionName,
    requestId: requestId || process.env.AWS_REQUEST_ID,
    correlationId: process.env.CORRELATION_ID,
  });
}
