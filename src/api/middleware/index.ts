/**
 * API Middleware - Barrel Export
 *
 * Registration order in createApp():
 * 1. Error Handler - `app.onError(errorHandler())`
 * 2. Logger - Logs request information
 * 3. CORS - Handles cross-origin requests
 */

export {
  corsMiddleware,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
} from './cors';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  notFoundError,
  validationError,
  type ErrorCode,
} from './error-handler';

export {
  loggerMiddleware,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

export { parseQuery, parseParams, toValidationDetails } from './validate';
