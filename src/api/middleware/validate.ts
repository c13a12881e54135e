/**
 * Zod Request Validation
 *
 * Parses query strings and path parameters against zod schemas. A failed
 * parse throws a VALIDATION_ERROR AppError with one detail per failing
 * field, which the global error handler turns into a 400 response:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid query parameters",
 *     "details": [
 *       { "path": "granularity", "message": "Invalid enum value. Expected 'daily' | 'weekly' | 'monthly', received 'hourly'" }
 *     ]
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.get('/streams', async (c) => {
 *   const { period, granularity } = parseQuery(c, streamsQuerySchema);
 *   return success(c, await aggregator.getStreams(period ?? DEFAULT_PERIOD, granularity));
 * });
 * ```
 */

import type { Context } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { validationError } from './error-handler';

/**
 * Converts zod issues into the API's field-level error details.
 */
export function toValidationDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function parseWith<T>(
  input: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  message: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw validationError(message, toValidationDetails(result.error));
  }
  return result.data;
}

/**
 * Validates the request's query parameters.
 *
 * @throws AppError (VALIDATION_ERROR, 400) when the query does not match
 */
export function parseQuery<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  return parseWith(c.req.query(), schema, 'Invalid query parameters');
}

/**
 * Validates the matched route's path parameters.
 *
 * @throws AppError (VALIDATION_ERROR, 400) when a parameter does not match
 */
export function parseParams<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  return parseWith(c.req.param(), schema, 'Invalid path parameters');
}
