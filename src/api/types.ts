/**
 * API Response Types
 *
 * Standardized response type definitions for the Artist Pulse API, plus the
 * zod schemas for query and path parameters.
 *
 * Every endpoint returns one of two shapes:
 * 1. ApiResponse<T> - For successful responses with typed data
 * 2. ApiErrorResponse - For error responses with structured error info
 *
 * @example
 * ```typescript
 * // Success response
 * const response: ApiResponse<StreamsView> = {
 *   success: true,
 *   data: { period: 'Last 7 Days', days: 7, ... }
 * };
 *
 * // Error response
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: {
 *     code: 'VALIDATION_ERROR',
 *     message: 'Invalid query parameters',
 *   }
 * };
 * ```
 */

import { z } from 'zod';
import { PERIOD_DAYS, isPeriodLabel, type PeriodLabel } from '../core/transform';
import { PLATFORM_NAMES } from '../platforms';

// ============================================================================
// Success Response Types
// ============================================================================

/**
 * Standard success response wrapper for API endpoints.
 *
 * @typeParam T - The type of data being returned
 */
export interface ApiResponse<T> {
  /** Indicates the request was successful */
  success: true;
  /** The response payload with type T */
  data: T;
}

// ============================================================================
// Error Response Types
// ============================================================================

/**
 * Detailed error information structure.
 */
export interface ApiError {
  /**
   * Machine-readable error code for programmatic handling.
   * Examples: 'VALIDATION_ERROR', 'NOT_FOUND', 'PLATFORM_NOT_CONFIGURED'
   */
  code: string;

  /** Human-readable error message suitable for display */
  message: string;

  /**
   * Additional error context (optional).
   * For validation errors, this contains field-level error details.
   */
  details?: unknown;
}

/**
 * Standard error response wrapper for API endpoints.
 *
 * @example
 * ```typescript
 * const response = await fetch('/api/dashboard/streams?granularity=hourly');
 * const data = await response.json();
 *
 * if (!data.success) {
 *   console.error(`Error ${data.error.code}: ${data.error.message}`);
 * }
 * ```
 */
export interface ApiErrorResponse {
  /** Indicates the request failed */
  success: false;
  /** Error information */
  error: ApiError;
}

/**
 * Union type for any API response (success or error).
 *
 * @typeParam T - The type of data for successful responses
 */
export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

// ============================================================================
// Validation Detail Types
// ============================================================================

/**
 * Structure for individual validation error details.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g., 'granularity') */
  path: string;
  /** Human-readable description of the validation failure */
  message: string;
}

// ============================================================================
// Query Parameter Schemas (Zod)
// ============================================================================

const PERIOD_LABELS = Object.keys(PERIOD_DAYS);

/** Period label used when a request names none */
export const DEFAULT_PERIOD: PeriodLabel = 'Last 30 Days';

/**
 * Period label, e.g. "Last 90 Days". Unknown labels are rejected rather
 * than silently widened to the default.
 */
export const periodSchema = z
  .string()
  .refine(isPeriodLabel, { message: `Expected one of: ${PERIOD_LABELS.join(', ')}` });

/** Query for views that only take a period */
export const periodQuerySchema = z.object({
  period: periodSchema.optional(),
});

export type PeriodQuery = z.infer<typeof periodQuerySchema>;

/**
 * Query for the streams view.
 *
 * @example
 * GET /api/dashboard/streams?period=Last%2090%20Days&granularity=weekly
 */
export const streamsQuerySchema = periodQuerySchema.extend({
  granularity: z.enum(['daily', 'weekly', 'monthly']).default('daily'),
});

export type StreamsQuery = z.infer<typeof streamsQuerySchema>;

/** Query for the content view; `song` selects the detailed song */
export const contentQuerySchema = periodQuerySchema.extend({
  song: z.string().trim().min(1, 'Song must not be empty').optional(),
});

export type ContentQuery = z.infer<typeof contentQuerySchema>;

/** Path parameters of the platform artist lookup */
export const platformArtistParamsSchema = z.object({
  platform: z.enum(PLATFORM_NAMES),
  id: z
    .string()
    .min(1)
    .max(128, 'Artist ID must be 128 characters or less')
    .regex(/^[A-Za-z0-9._:-]+$/, 'Artist ID contains unsupported characters'),
});

export type PlatformArtistParams = z.infer<typeof platformArtistParamsSchema>;
