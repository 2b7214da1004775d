/**
 * Services exports
 */

export {
  type ErrorContext,
  type ErrorCallback,
  type ErrorHandler,
  type ErrorLogEntry,
  ErrorHandlerImpl,
  createErrorHandler,
} from './error-handler.js';
