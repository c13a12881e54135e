/**
 * Hono application factory.
 *
 * createApp() wires middleware and routes around injected dependencies so
 * tests can build an app over fixture data; createDefaultDependencies()
 * derives the production dependencies from the loaded configuration.
 *
 * Middleware order:
 * 1. Error Handler - `app.onError`, formats every thrown error
 * 2. Logger - Logs all requests with timing
 * 3. CORS - Handles cross-origin requests
 */

import { Hono } from 'hono';
import { config as loadedConfig, type Config } from '../config';
import { DashboardDataAggregator, SampleDataSource } from '../core/dashboard';
import { getPeriodForDays, type PeriodLabel } from '../core/transform';
import { corsMiddleware, errorHandler, loggerMiddleware } from './middleware';
import { createApiRouter, healthRoutes, type ApiRouterOptions } from './routes';
import { DEFAULT_PERIOD } from './types';
import { error } from './utils/response';

/** Application version - should match package.json version */
export const APP_VERSION = '0.1.0';

export interface AppDependencies extends ApiRouterOptions {
  environment: string;
  allowedOrigins?: string[];
  /** Log one line per request (default true) */
  logRequests?: boolean;
}

/**
 * Maps a day count onto the period label of the same length, or the
 * default period when no label matches.
 */
export function periodForDays(days: number): PeriodLabel {
  return getPeriodForDays(days) ?? DEFAULT_PERIOD;
}

/**
 * Builds the dependencies of the production app from configuration.
 */
export function createDefaultDependencies(cfg: Config = loadedConfig): AppDependencies {
  const aggregator = new DashboardDataAggregator(new SampleDataSource(cfg.data.sampleSeed), {
    artistName: cfg.data.artistName,
  });

  return {
    aggregator,
    defaultPeriod: periodForDays(cfg.data.defaultDays),
    version: APP_VERSION,
    environment: cfg.server.nodeEnv,
    allowedOrigins: cfg.cors.allowedOrigins,
    platforms: {
      credentials: cfg.platforms,
      clientOptions: {
        timeoutMs: cfg.api.timeoutMs,
        cacheExpirySeconds: cfg.api.cacheExpirySeconds,
      },
    },
  };
}

/**
 * Creates and configures the Hono application.
 */
export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (deps.logRequests ?? true) {
    app.use('*', loggerMiddleware());
  }

  app.use('*', corsMiddleware({ allowedOrigins: deps.allowedOrigins }));

  app.route('/health', healthRoutes({ environment: deps.environment, version: deps.version }));
  app.route('/api', createApiRouter(deps));

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}
