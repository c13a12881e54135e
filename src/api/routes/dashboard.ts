/**
 * Dashboard API Routes
 *
 * REST endpoints for the four dashboard views and the detailed streams
 * series, backed by DashboardDataAggregator.
 *
 * Endpoints:
 * - GET /api/dashboard/overview?period=
 * - GET /api/dashboard/streams?period=&granularity=daily|weekly|monthly
 * - GET /api/dashboard/audience?period=
 * - GET /api/dashboard/content?period=&song=
 * - GET /api/dashboard/revenue?period=
 *
 * `period` is a label such as "Last 90 Days" and defaults to the router's
 * default period. Invalid parameters produce a 400 VALIDATION_ERROR.
 *
 * @example
 * ```typescript
 * app.route('/dashboard', dashboardRoutes(aggregator));
 *
 * // GET /api/dashboard/streams?period=Last%2090%20Days&granularity=weekly
 * ```
 */

import { Hono } from 'hono';
import type { DashboardDataAggregator } from '../../core/dashboard';
import type { PeriodLabel } from '../../core/transform';
import { parseQuery } from '../middleware/validate';
import {
  DEFAULT_PERIOD,
  contentQuerySchema,
  periodQuerySchema,
  streamsQuerySchema,
} from '../types';
import { success } from '../utils/response';

/**
 * Creates the dashboard router.
 *
 * @param aggregator - Builds the view payloads
 * @param defaultPeriod - Period used when a request names none
 */
export function dashboardRoutes(
  aggregator: DashboardDataAggregator,
  defaultPeriod: PeriodLabel = DEFAULT_PERIOD
): Hono {
  const router = new Hono();

  router.get('/overview', async (c) => {
    const { period = defaultPeriod } = parseQuery(c, periodQuerySchema);
    return success(c, await aggregator.getOverview(period));
  });

  router.get('/streams', async (c) => {
    const { period = defaultPeriod, granularity } = parseQuery(c, streamsQuerySchema);
    return success(c, await aggregator.getStreams(period, granularity));
  });

  router.get('/audience', async (c) => {
    const { period = defaultPeriod } = parseQuery(c, periodQuerySchema);
    return success(c, await aggregator.getAudience(period));
  });

  /**
   * GET /content
   *
   * Song table plus the detail of `song` (or of the top song). An unknown
   * song is a 400 INVALID_PARAMETER.
   */
  router.get('/content', async (c) => {
    const { period = defaultPeriod, song } = parseQuery(c, contentQuerySchema);
    return success(c, await aggregator.getContent(period, song));
  });

  router.get('/revenue', async (c) => {
    const { period = defaultPeriod } = parseQuery(c, periodQuerySchema);
    return success(c, await aggregator.getRevenue(period));
  });

  return router;
}
