/**
 * Logger System
 * Levelled logging with pluggable output and scoped child loggers
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  scope?: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  /** Returns a logger that tags every entry with `scope` and shares this logger's level */
  child(scope: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(entryLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export type LogOutput = (entry: LogEntry) => void;

export function formatLogEntry(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `[${entry.timestamp.toISOString()}] [${entry.level.toUpperCase()}]${scope} ${entry.message}${contextStr}`;
}

export const consoleOutput: LogOutput = (entry: LogEntry) => {
  const line = formatLogEntry(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

/**
 * Level state is held in a shared box so that child loggers follow setLevel on the parent
 */
interface LevelHolder {
  level: LogLevel;
}

export class LoggerImpl implements Logger {
  private holder: LevelHolder;
  private output: LogOutput;
  private scope?: string;

  constructor(level: LogLevel = 'info', output: LogOutput = consoleOutput, scope?: string, holder?: LevelHolder) {
    this.holder = holder ?? { level };
    this.output = output;
    this.scope = scope;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.holder.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      ...(this.scope !== undefined ? { scope: this.scope } : {}),
      ...(context !== undefined ? { context } : {}),
    };

    this.output(entry);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    const errorContext: LogContext = {
      ...context,
    };

    if (error) {
      errorContext.errorMessage = error.message;
      errorContext.errorStack = error.stack;
    }

    this.log('error', message, Object.keys(errorContext).length > 0 ? errorContext : undefined);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new LoggerImpl(this.holder.level, this.output, nested, this.holder);
  }

  setLevel(level: LogLevel): void {
    this.holder.level = level;
  }

  getLevel(): LogLevel {
    return this.holder.level;
  }
}

export function createLogger(level: LogLevel = 'info', output?: LogOutput): Logger {
  return new LoggerImpl(level, output);
}

/**
 * Normalizes anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
