/**
 * Request Logger Middleware
 *
 * Logs each request as one line with method, path and query, status and
 * response time:
 *
 * ```
 * [API] GET /api/dashboard/streams?granularity=weekly 200 - 15ms
 * [API] GET /api/platforms/spotify/artists/abc 503 - 3ms
 * ```
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: false }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';

/**
 * Configuration options for the logger middleware
 */
export interface LoggerConfig {
  /** Prefix for log messages */
  prefix: string;
  /** Whether to include timestamp in logs */
  includeTimestamp: boolean;
  /** Paths to skip logging (e.g., health checks) */
  skipPaths: string[];
  /** Whether to log in color (for terminal output) */
  colorize: boolean;
  /** Where lines are written */
  write: (line: string) => void;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

/**
 * Formats a response time: milliseconds under a second, seconds above.
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Creates a logger middleware that logs request information.
 *
 * @param config - Optional configuration overrides
 */
export function loggerMiddleware(
  config: Partial<LoggerConfig> = {}
): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path === skip || path.startsWith(`${skip}/`))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = Math.round(performance.now() - startTime);

    const url = new URL(c.req.url);
    const target = `${path}${url.search}`;
    const method = c.req.method;
    const status = c.res.status;

    let logMessage = finalConfig.colorize
      ? [
          finalConfig.prefix,
          `${colors.cyan}${method.padEnd(7)}${colors.reset}`,
          target,
          `${getStatusColor(status)}${status}${colors.reset}`,
          '-',
          `${colors.dim}${formatResponseTime(responseTime)}${colors.reset}`,
        ].join(' ')
      : `${finalConfig.prefix} ${method} ${target} ${status} - ${formatResponseTime(responseTime)}`;

    if (finalConfig.includeTimestamp) {
      logMessage = `[${new Date().toISOString()}] ${logMessage}`;
    }

    finalConfig.write(logMessage);
  };
}

export { DEFAULT_LOGGER_CONFIG };
