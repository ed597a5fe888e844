/**
 * Logger interfaces and implementations
 *
 * Why: Structured, level-based logging for the contract loader, the model
 * generator and the batch validator. Both implementations write to stderr
 * so the CLI report can be piped separately from program output.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogFormat = 'console' | 'json';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Parse a level name (case-insensitive), falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const name = value?.toUpperCase();
  switch (name) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

abstract class LeveledLogger implements Logger {
  protected level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error
        ? { error: error.message, stack: error.stack, ...context }
        : context;
      this.write('error', message, errorContext);
    }
  }

  protected abstract write(level: string, message: string, context?: Record<string, unknown>): void;
}

/**
 * Human-readable logger - `[timestamp] LEVEL: message {context}`
 */
export class ConsoleLogger extends LeveledLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    console.error(`[${timestamp}] ${level.toUpperCase()}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for log aggregation, one object per line
 */
export class JsonLogger extends LeveledLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Logger that drops everything; default for library use
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _error?: Error, _context?: Record<string, unknown>): void {}
}

export function createLogger(format: LogFormat = 'console', level?: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
