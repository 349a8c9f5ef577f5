/**
 * Centralized logging utility
 * Provides structured logging with environment-based filtering
 */

import { isDevEnvironment, readEnv } from "./env";

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

/**
 * Log level priorities for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Gets the minimum log level from `LOG_LEVEL`
 */
function getMinLogLevel(): LogLevel {
  const level = readEnv('LOG_LEVEL')?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return isDevEnvironment() ? 'debug' : 'warn';
}

function formatLogEntry(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    return `${prefix} ${entry.message} ${JSON.stringify(entry.context)}`;
  }
  return `${prefix} ${entry.message}`;
}

/**
 * Logger class with structured logging support
 */
export class Logger {
  private minLevel: LogLevel;
  private prefix: string;

  constructor(prefix: string = '') {
    this.minLevel = getMinLogLevel();
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    const fullMessage = this.prefix ? `[${this.prefix}] ${message}` : message;
    return {
      level,
      message: fullMessage,
      timestamp: new Date().toISOString(),
      context,
    };
  }

  private output(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) {
      return;
    }

    const formatted = formatLogEntry(entry);

    switch (entry.level) {
      case 'debug':
        // eslint-disable-next-line no-console
        console.debug(formatted);
        break;
      case 'info':
        // eslint-disable-next-line no-console
        console.info(formatted);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(formatted);
        break;
      case 'error':
        // eslint-disable-next-line no-console
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.output(this.createEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    this.output(this.createEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.output(this.createEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    this.output(this.createEntry('error', message, context));
  }

  /**
   * Log an error with the Error object
   */
  logError(message: string, error: unknown, context?: LogContext): void {
    const errorContext: LogContext = { ...context };

    if (error instanceof Error) {
      errorContext.errorName = error.name;
      errorContext.errorMessage = error.message;
      if ('code' in error && typeof error.code === 'string') {
        errorContext.errorCode = error.code;
      }
      if (isDevEnvironment() && error.stack) {
        errorContext.stack = error.stack;
      }
    } else {
      errorContext.error = String(error);
    }

    this.error(message, errorContext);
  }

  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger(childPrefix);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

// Named loggers for the dialogue core and its collaborators
export const engineLogger = createLogger('engine');
export const reducerLogger = createLogger('reducer');
export const directoryLogger = createLogger('directory');
export const sessionLogger = createLogger('session');
