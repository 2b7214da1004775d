/**
 * Core module exports
 * Configuration and logging
 */

export {
  type BotConfig,
  type LogLevel as ConfigLogLevel,
  ConfigurationError,
  DEFAULT_DATABASE_PATH,
  loadConfigFromEnv,
  validateConfig,
} from './config.js';

export {
  type LogLevel,
  type LogEntry,
  type LogContext,
  type Logger,
  type LogOutput,
  LoggerImpl,
  shouldLog,
  formatLogEntry,
  consoleOutput,
  createLogger,
  toError,
} from './logger.js';
