/**
 * API Routes Aggregator
 *
 * Combines the route modules into the /api router.
 *
 * Route Structure:
 * - /health - Health check endpoint (mounted at root, not under /api)
 * - /api - API root with version info
 * - /api/dashboard - Dashboard views built from sample data
 * - /api/platforms - Live artist lookups on streaming platforms
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes({ environment: 'development', version: '0.1.0' }));
 * app.route('/api', createApiRouter({ aggregator, platforms: { credentials } }));
 * ```
 */

import { Hono } from 'hono';
import type { DashboardDataAggregator } from '../../core/dashboard';
import type { PeriodLabel } from '../../core/transform';
import { success } from '../utils/response';
import { dashboardRoutes } from './dashboard';
import { platformRoutes, type PlatformRoutesOptions } from './platforms';

export { healthRoutes, type HealthCheckData, type HealthRouteOptions } from './health';
export { dashboardRoutes } from './dashboard';
export { platformRoutes, type PlatformRoutesOptions, type PlatformStatus } from './platforms';

/**
 * API information returned by the root endpoint.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export interface ApiRouterOptions {
  aggregator: DashboardDataAggregator;
  platforms: PlatformRoutesOptions;
  defaultPeriod?: PeriodLabel;
  version: string;
}

/**
 * Creates the main API router with all routes mounted.
 */
export function createApiRouter(options: ApiRouterOptions): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Artist Pulse API',
      version: options.version,
      endpoints: [
        { path: '/api/dashboard/overview', description: 'Headline metrics and trends' },
        { path: '/api/dashboard/streams', description: 'Streams by day, week or month with forecast' },
        { path: '/api/dashboard/audience', description: 'Geography, demographics and engagement' },
        { path: '/api/dashboard/content', description: 'Song performance' },
        { path: '/api/dashboard/revenue', description: 'Revenue by platform and projection' },
        { path: '/api/platforms', description: 'Streaming platforms and their configuration' },
        { path: '/api/platforms/:platform/artists/:id', description: 'Artist profile from a platform' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/dashboard', dashboardRoutes(options.aggregator, options.defaultPeriod));
  router.route('/platforms', platformRoutes(options.platforms));

  return router;
}

export default createApiRouter;
