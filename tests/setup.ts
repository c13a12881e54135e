/**
 * Test Setup Module
 *
 * Builds isolated API test environments: a Hono app over the fixture data
 * source, with platform credentials and a fetch stand-in supplied per test.
 * Nothing here opens a socket or reaches the network.
 */

import type { Hono } from 'hono';
import { createApp } from '../src/api';
import { DashboardDataAggregator } from '../src/core/dashboard';
import type { PeriodLabel } from '../src/core/transform';
import type { PlatformCredentials } from '../src/platforms';
import { FIXTURE_TODAY, FixtureDataSource } from './helpers';

// ============================================================================
// Type Definitions
// ============================================================================

export interface TestContextOptions {
  credentials?: Partial<PlatformCredentials>;
  fetchImpl?: typeof fetch;
  defaultPeriod?: PeriodLabel;
  cacheExpirySeconds?: number;
}

/**
 * Everything a test app is built from, kept so tests can inspect it.
 */
export interface TestContext {
  dataSource: FixtureDataSource;
  aggregator: DashboardDataAggregator;
  credentials: PlatformCredentials;
  options: TestContextOptions;
}

// ============================================================================
// Context & App Creation
// ============================================================================

/**
 * Creates a test context over the fixture data set, with "today" fixed to
 * FIXTURE_TODAY and no platform configured unless credentials are given.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const dataSource = new FixtureDataSource();
  const aggregator = new DashboardDataAggregator(dataSource, {
    artistName: 'Test Artist',
    now: () => FIXTURE_TODAY,
  });

  return {
    dataSource,
    aggregator,
    credentials: {
      spotify: {},
      appleMusic: {},
      youtube: {},
      amazonMusic: {},
      ...options.credentials,
    },
    options,
  };
}

/**
 * Creates the application under test with request logging off.
 */
export function createTestApp(context: TestContext): Hono {
  return createApp({
    aggregator: context.aggregator,
    defaultPeriod: context.options.defaultPeriod ?? 'Last 7 Days',
    version: '0.1.0',
    environment: 'test',
    logRequests: false,
    platforms: {
      credentials: context.credentials,
      clientOptions: {
        fetchImpl: context.options.fetchImpl,
        cacheExpirySeconds: context.options.cacheExpirySeconds ?? 0,
      },
    },
  });
}
