/**
 * Health Check Route
 *
 * Lightweight liveness endpoint for load balancers and uptime monitors.
 * It performs no platform calls and needs no configuration.
 *
 * @example
 * ```bash
 * curl http://localhost:3000/health
 *
 * # {
 * #   "success": true,
 * #   "data": {
 * #     "status": "ok",
 * #     "timestamp": "2024-01-15T10:30:00.000Z",
 * #     "environment": "development",
 * #     "version": "0.1.0"
 * #   }
 * # }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 timestamp of when the check was performed */
  timestamp: string;
  environment: string;
  version: string;
}

export interface HealthRouteOptions {
  environment: string;
  version: string;
  now?: () => Date;
}

/**
 * Creates the health check router, mounted at /health.
 */
export function healthRoutes(options: HealthRouteOptions): Hono {
  const router = new Hono();
  const now = options.now ?? (() => new Date());

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: now().toISOString(),
      environment: options.environment,
      version: options.version,
    };

    return success(c, healthData);
  });

  return router;
}
