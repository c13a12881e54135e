/**
 * API Module - Barrel Export
 *
 * The HTTP API is built on Hono and served on Node by @hono/node-server
 * (see server.ts). Import createApp to embed or test the app without
 * starting a server.
 *
 * @example
 * ```typescript
 * import { createApp, createDefaultDependencies } from './api';
 *
 * const app = createApp(createDefaultDependencies());
 * const res = await app.request('/api/dashboard/overview');
 * ```
 */

export { createApp, createDefaultDependencies, periodForDays, APP_VERSION, type AppDependencies } from './app';

export {
  corsMiddleware,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  notFoundError,
  validationError,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  parseQuery,
  parseParams,
} from './middleware';

export { createApiRouter, healthRoutes, dashboardRoutes, platformRoutes } from './routes';

export {
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  periodQuerySchema,
  streamsQuerySchema,
  contentQuerySchema,
  platformArtistParamsSchema,
  DEFAULT_PERIOD,
} from './types';

export { success, error } from './utils/response';
