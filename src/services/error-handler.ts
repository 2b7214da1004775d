/**
 * Error Handler
 * Catches handler errors, logs them with Discord context, provides the user-facing message
 */

import { type Logger, createLogger } from '../core/logger.js';

/**
 * Where the failing event came from
 */
export interface ErrorContext {
  userId?: string;
  channelId?: string;
  guildId?: string;
  /** Message command name or slash command name, when known */
  command?: string;
}

export type ErrorCallback = (error: Error, ctx: ErrorContext) => void;

export interface ErrorHandler {
  handle(error: Error, ctx: ErrorContext): Promise<void>;
  setUserMessage(message: string): void;
  getUserMessage(): string;
  onError(callback: ErrorCallback): void;
  getLastLoggedError(): ErrorLogEntry | null;
}

export interface ErrorLogEntry {
  errorMessage: string;
  stackTrace: string | undefined;
  userId: string | undefined;
  channelId: string | undefined;
  command: string | undefined;
  timestamp: Date;
}

const DEFAULT_USER_MESSAGE = 'Something went wrong while handling that. Please try again later.';

export class ErrorHandlerImpl implements ErrorHandler {
  private logger: Logger;
  private userMessage: string;
  private callbacks: ErrorCallback[] = [];
  private lastLoggedError: ErrorLogEntry | null = null;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('error');
    this.userMessage = DEFAULT_USER_MESSAGE;
  }

  async handle(error: Error, ctx: ErrorContext): Promise<void> {
    this.lastLoggedError = {
      errorMessage: error.message,
      stackTrace: error.stack,
      userId: ctx.userId,
      channelId: ctx.channelId,
      command: ctx.command,
      timestamp: new Date(),
    };

    this.logger.error('Handler error occurred', error, {
      userId: ctx.userId,
      channelId: ctx.channelId,
      guildId: ctx.guildId,
      command: ctx.command,
    });

    for (const callback of this.callbacks) {
      try {
        callback(error, ctx);
      } catch (callbackError) {
        this.logger.warn('Error callback threw an exception', {
          callbackError: callbackError instanceof Error ? callbackError.message : String(callbackError),
        });
      }
    }
  }

  setUserMessage(message: string): void {
    this.userMessage = message;
  }

  getUserMessage(): string {
    return this.userMessage;
  }

  onError(callback: ErrorCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Last handled error, kept for diagnostics
   */
  getLastLoggedError(): ErrorLogEntry | null {
    return this.lastLoggedError;
  }
}

export function createErrorHandler(logger?: Logger): ErrorHandler {
  return new ErrorHandlerImpl(logger);
}
