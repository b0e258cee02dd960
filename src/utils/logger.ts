/**
 * Structured logging utility for Leak Triage
 * Emits one JSON line per entry on stderr; stdout is reserved for the report
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

/** Shared across a logger and its children so setLevel applies everywhere */
interface LevelHolder {
  current: LogLevel;
}

class Logger {
  private level: LevelHolder;
  private context: Record<string, unknown>;

  constructor(minLevel: LogLevel | LevelHolder = 'info', context: Record<string, unknown> = {}) {
    this.level = typeof minLevel === 'string' ? { current: minLevel } : minLevel;
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level.current];
  }

  private formatEntry(level: LogLevel, message: string, context?: Record<string, unknown>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
    };
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const output = JSON.stringify(this.formatEntry(level, message, context));

    if (level === 'warn') {
      console.warn(output);
    } else {
      console.error(output);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.level, {
      ...this.context,
      ...additionalContext,
    });
  }

  /**
   * Set the minimum log level for this logger and every logger sharing its level
   */
  setLevel(level: LogLevel): void {
    this.level.current = level;
  }

  getLevel(): LogLevel {
    return this.level.current;
  }
}

// Default logger instance
const envLevel = process.env.LOG_LEVEL;
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info', { service: 'leak-triage' });

/**
 * Create a logger for a specific module
 */
export function createLogger(module: string, context?: Record<string, unknown>): Logger {
  return logger.child({ module, ...context });
}

export { Logger };
