/**
 * JSON over HTTP for the platform clients.
 *
 * One helper performs every request: it applies the timeout, maps HTTP
 * status codes onto PlatformError types and validates the body with a zod
 * schema before any adapter reads it.
 */

import { z } from 'zod';
import { PlatformError, type PlatformErrorType, type PlatformName } from './types';

/** Default request timeout (milliseconds) */
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface RequestJsonOptions {
  platform: PlatformName;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Form-encoded request body */
  form?: Record<string, string>;
  query?: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Maps a non-2xx status onto an error type.
 */
export function errorTypeForStatus(status: number): PlatformErrorType {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 404) return 'not_found';
  if (status === 429) return 'rate_limited';
  return 'network';
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Appends query parameters to a URL.
 */
export function withQuery(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * Performs a request and returns the validated JSON body.
 *
 * @throws PlatformError typed after the status, or `network` for transport
 *   failures and timeouts, or `invalid_response` when the body is not JSON
 *   or does not match the schema
 */
export async function requestJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestJsonOptions
): Promise<T> {
  const { platform, method = 'GET', timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };

  let body: string | undefined;
  if (options.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(options.form).toString();
  }

  let response: Response;
  try {
    response = await fetchImpl(withQuery(url, options.query), {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const message = isTimeout(error)
      ? `Request to ${platform} timed out after ${timeoutMs}ms`
      : `Failed to connect to ${platform}`;
    throw new PlatformError(message, 'network', error instanceof Error ? error : undefined, platform);
  }

  if (!response.ok) {
    throw new PlatformError(
      `${platform} responded with ${response.status} ${response.statusText}`.trim(),
      errorTypeForStatus(response.status),
      undefined,
      platform
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new PlatformError(
      `${platform} returned a body that is not JSON`,
      'invalid_response',
      error instanceof Error ? error : undefined,
      platform
    );
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PlatformError(
      `${platform} returned an unexpected payload: ${issues}`,
      'invalid_response',
      result.error,
      platform
    );
  }

  return result.data;
}
