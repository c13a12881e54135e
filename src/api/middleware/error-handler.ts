/**
 * Global Error Handler for the Artist Pulse API
 *
 * Every error that escapes a route is turned into the standard JSON error
 * envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... } // Optional additional context
 *   }
 * }
 * ```
 *
 * Status codes follow the error's origin:
 * - AppError: its own status
 * - TransformError (bad dates, methods or parameters): 400
 * - PlatformError: 404 for unknown artists, 503 when a platform is not
 *   configured or rate limited, 502 for other upstream failures
 * - Anything else: 500
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { errorHandler, AppError } from './middleware/error-handler';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/protected', () => {
 *   throw new AppError('UNAUTHORIZED', 'Authentication required', 401);
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { TransformError, type TransformErrorType } from '../../core/transform';
import { PlatformError, type PlatformErrorType } from '../../platforms';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  MALFORMED_DATE: 'MALFORMED_DATE',
  UNSUPPORTED_METHOD: 'UNSUPPORTED_METHOD',
  INVALID_PARAMETER: 'INVALID_PARAMETER',

  // Server and upstream errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  PLATFORM_NOT_CONFIGURED: 'PLATFORM_NOT_CONFIGURED',
  PLATFORM_RATE_LIMITED: 'PLATFORM_RATE_LIMITED',
  PLATFORM_AUTH_FAILED: 'PLATFORM_AUTH_FAILED',
  PLATFORM_UNAVAILABLE: 'PLATFORM_UNAVAILABLE',
  PLATFORM_INVALID_RESPONSE: 'PLATFORM_INVALID_RESPONSE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom application error class for throwing controlled errors.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Song not found', 404, { song });
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  /** HTTP status code to return */
  public readonly statusCode: ContentfulStatusCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

const TRANSFORM_ERROR_CODES: Record<TransformErrorType, ErrorCode> = {
  malformed_date: ErrorCodes.MALFORMED_DATE,
  unsupported_method: ErrorCodes.UNSUPPORTED_METHOD,
  invalid_parameter: ErrorCodes.INVALID_PARAMETER,
};

const PLATFORM_ERRORS: Record<PlatformErrorType, { code: ErrorCode; statusCode: ContentfulStatusCode }> = {
  not_found: { code: ErrorCodes.NOT_FOUND, statusCode: 404 },
  not_configured: { code: ErrorCodes.PLATFORM_NOT_CONFIGURED, statusCode: 503 },
  rate_limited: { code: ErrorCodes.PLATFORM_RATE_LIMITED, statusCode: 503 },
  authentication: { code: ErrorCodes.PLATFORM_AUTH_FAILED, statusCode: 502 },
  network: { code: ErrorCodes.PLATFORM_UNAVAILABLE, statusCode: 502 },
  invalid_response: { code: ErrorCodes.PLATFORM_INVALID_RESPONSE, statusCode: 502 },
};

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production';
}

/**
 * Formats an error into the standard API error response structure.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof TransformError) {
    return {
      response: {
        success: false,
        error: { code: TRANSFORM_ERROR_CODES[error.type], message: error.message },
      },
      statusCode: 400,
    };
  }

  if (error instanceof PlatformError) {
    const { code, statusCode } = PLATFORM_ERRORS[error.type];
    return {
      response: {
        success: false,
        error: {
          code,
          message: error.message,
          ...(error.platform !== undefined && { details: { platform: error.platform } }),
        },
      },
      statusCode,
    };
  }

  if (error instanceof Error) {
    const isDev = isDevelopment();

    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev
            ? error.message
            : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Non-Error throws (rare but possible)
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(isDevelopment() && {
          details: { rawError: String(error) },
        }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the global error handler, registered with `app.onError()`.
 *
 * Expected failures (client errors and upstream platform errors) are
 * logged as one-line warnings; everything else is logged with its stack.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    const { response, statusCode } = formatErrorResponse(error);

    if (statusCode >= 500 && response.error.code === ErrorCodes.INTERNAL_ERROR) {
      console.error('[Error Handler]', error);
    } else {
      console.warn(`[Error Handler] ${response.error.code}: ${response.error.message}`);
    }

    return c.json(response, statusCode);
  };
}

/**
 * Helper function to create a not found error for resources.
 *
 * @example
 * ```typescript
 * if (!songs.includes(song)) {
 *   throw notFoundError('Song', song);
 * }
 * ```
 */
export function notFoundError(resource: string, id: string | number): AppError {
  return new AppError(
    ErrorCodes.NOT_FOUND,
    `${resource} '${id}' not found`,
    404,
    { resource, id }
  );
}

/**
 * Helper function to create a validation error.
 */
export function validationError(
  message: string,
  details?: unknown
): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}
