/**
 * API Response Utilities
 *
 * Helper functions for creating consistent API responses. Every endpoint
 * returns the envelope defined in types.ts:
 * - success(): `{ success: true, data }`
 * - error(): `{ success: false, error: { code, message, details? } }`
 *
 * @example
 * ```typescript
 * import { success, error } from './utils/response';
 *
 * router.get('/overview', async (c) => {
 *   const overview = await aggregator.getOverview('Last 30 Days');
 *   return success(c, overview);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * Creates a standardized success response.
 *
 * @typeParam T - Type of the data being returned
 * @param c - Hono context object
 * @param data - The data to include in the response
 * @param statusCode - HTTP status code (default: 200)
 *
 * @example
 * ```typescript
 * app.get('/health', (c) => {
 *   return success(c, { status: 'ok' });
 * });
 * ```
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helper
// ============================================================================

/**
 * Creates a standardized error response.
 *
 * @param c - Hono context object
 * @param code - Machine-readable error code (e.g., 'NOT_FOUND', 'VALIDATION_ERROR')
 * @param message - Human-readable error message
 * @param statusCode - HTTP status code (default: 400)
 * @param details - Optional additional error context
 *
 * @example
 * ```typescript
 * app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.path} not found`, 404));
 * ```
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
