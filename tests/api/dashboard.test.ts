/**
 * Dashboard API Endpoint Tests
 *
 * Tests for the endpoints that serve the dashboard views. These verify the
 * API contract, the response envelope and query parameter handling, using
 * the fixed fixture data set so payload values can be checked exactly.
 *
 * Endpoints tested:
 * - GET /api/dashboard/overview
 * - GET /api/dashboard/streams
 * - GET /api/dashboard/audience
 * - GET /api/dashboard/content
 * - GET /api/dashboard/revenue
 * - GET /api, GET /health and unknown routes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { createTestContext, createTestApp, type TestContext } from '../setup';
import { getJsonResponse, assertSuccess, assertError } from '../helpers';
import type { ApiErrorResponse, ApiResponse } from '../../src/api/types';
import type {
  AudienceView,
  ContentView,
  DashboardOverview,
  RevenueView,
  StreamsView,
} from '../../src/core/dashboard';
import type { HealthCheckData } from '../../src/api/routes/health';
import type { ApiInfo } from '../../src/api/routes';

const WEEK = encodeURIComponent('Last 7 Days');

describe('Dashboard API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // GET /api/dashboard/overview
  // ==========================================================================
  describe('GET /api/dashboard/overview', () => {
    it('should return the overview for the requested period', async () => {
      const response = await app.request(`/api/dashboard/overview?period=${WEEK}`);
      const json = await getJsonResponse<ApiResponse<DashboardOverview>>(response);

      expect(response.status).toBe(200);
      assertSuccess(json);
      expect(json.data.period).toBe('Last 7 Days');
      expect(json.data.dateRange).toEqual({ start: '2024-03-04', end: '2024-03-10' });
      expect(json.data.totals.totalStreams).toBe(2800);
      expect(json.data.totals.topSong).toBe('Solar Flare');
    });

    it('should use the default period when none is given', async () => {
      const response = await app.request('/api/dashboard/overview');
      const json = await getJsonResponse<ApiResponse<DashboardOverview>>(response);

      expect(response.status).toBe(200);
      expect(json.data.period).toBe('Last 7 Days');
      expect(ctx.dataSource.requests).toEqual([{ days: 7, endDate: '2024-03-10' }]);
    });

    it('should reject an unknown period label', async () => {
      const response = await app.request(`/api/dashboard/overview?period=${encodeURIComponent('Last 5 Days')}`);
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      assertError(json, 'VALIDATION_ERROR');
      expect(json.error.message).toBe('Invalid query parameters');
      expect(json.error.details).toEqual([expect.objectContaining({ path: 'period' })]);
      expect(ctx.dataSource.requests).toEqual([]);
    });
  });

  // ==========================================================================
  // GET /api/dashboard/streams
  // ==========================================================================
  describe('GET /api/dashboard/streams', () => {
    it('should default to daily points', async () => {
      const response = await app.request(`/api/dashboard/streams?period=${WEEK}`);
      const json = await getJsonResponse<ApiResponse<StreamsView>>(response);

      expect(response.status).toBe(200);
      expect(json.data.granularity).toBe('daily');
      expect(json.data.points).toHaveLength(7);
      expect(json.data.points[6].cumulative).toBe(2800);
    });

    it('should aggregate weekly when asked', async () => {
      const response = await app.request(`/api/dashboard/streams?period=${WEEK}&granularity=weekly`);
      const json = await getJsonResponse<ApiResponse<StreamsView>>(response);

      expect(response.status).toBe(200);
      expect(json.data.points).toEqual([
        { date: '2024-03-04', streams: 2800, growthRate: null, movingAverage: null, cumulative: 2800 },
      ]);
    });

    it('should reject an unknown granularity', async () => {
      const response = await app.request('/api/dashboard/streams?granularity=hourly');
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      assertError(json, 'VALIDATION_ERROR');
      expect(json.error.details).toEqual([expect.objectContaining({ path: 'granularity' })]);
    });
  });

  // ==========================================================================
  // GET /api/dashboard/audience
  // ==========================================================================
  describe('GET /api/dashboard/audience', () => {
    it('should return geography sorted by listeners', async () => {
      const response = await app.request(`/api/dashboard/audience?period=${WEEK}`);
      const json = await getJsonResponse<ApiResponse<AudienceView>>(response);

      expect(response.status).toBe(200);
      expect(json.data.geography).toEqual([
        { category: 'United States', value: 2100, percentage: 75 },
        { category: 'Germany', value: 700, percentage: 25 },
      ]);
    });
  });

  // ==========================================================================
  // GET /api/dashboard/content
  // ==========================================================================
  describe('GET /api/dashboard/content', () => {
    it('should detail the requested song', async () => {
      const response = await app.request(
        `/api/dashboard/content?period=${WEEK}&song=${encodeURIComponent('Ocean Waves')}`
      );
      const json = await getJsonResponse<ApiResponse<ContentView>>(response);

      expect(response.status).toBe(200);
      expect(json.data.songs.map((s) => s.song)).toEqual(['Solar Flare', 'Ocean Waves']);
      expect(json.data.selected?.song).toBe('Ocean Waves');
    });

    it('should return 400 INVALID_PARAMETER for an unknown song', async () => {
      const response = await app.request(`/api/dashboard/content?period=${WEEK}&song=Nope`);
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      assertError(json, 'INVALID_PARAMETER');
      expect(json.error.message).toBe("Invalid song: unknown song 'Nope'");
    });

    it('should reject an empty song name', async () => {
      const response = await app.request('/api/dashboard/content?song=%20%20');

      expect(response.status).toBe(400);
      assertError(await getJsonResponse<ApiErrorResponse>(response), 'VALIDATION_ERROR');
    });
  });

  // ==========================================================================
  // GET /api/dashboard/revenue
  // ==========================================================================
  describe('GET /api/dashboard/revenue', () => {
    it('should return revenue totals', async () => {
      const response = await app.request(`/api/dashboard/revenue?period=${WEEK}`);
      const json = await getJsonResponse<ApiResponse<RevenueView>>(response);

      expect(response.status).toBe(200);
      expect(json.data.totalRevenue).toBe(6);
      expect(json.data.avgRevenuePerStream).toBe(0.003);
      expect(json.data.weeklyRevenue).toEqual([{ date: '2024-03-04', value: 6 }]);
    });
  });
});

describe('API root and health', () => {
  let app: Hono;

  beforeEach(() => {
    app = createTestApp(createTestContext());
  });

  it('GET /health reports status, environment and version', async () => {
    const response = await app.request('/health');
    const json = await getJsonResponse<ApiResponse<HealthCheckData>>(response);

    expect(response.status).toBe(200);
    expect(json.data.status).toBe('ok');
    expect(json.data.environment).toBe('test');
    expect(json.data.version).toBe('0.1.0');
    expect(Number.isNaN(Date.parse(json.data.timestamp))).toBe(false);
  });

  it('GET /api lists the endpoints', async () => {
    const response = await app.request('/api');
    const json = await getJsonResponse<ApiResponse<ApiInfo>>(response);

    expect(response.status).toBe(200);
    expect(json.data.name).toBe('Artist Pulse API');
    expect(json.data.endpoints.map((e) => e.path)).toContain('/api/dashboard/streams');
  });

  it('returns a NOT_FOUND envelope for unknown routes', async () => {
    const response = await app.request('/api/nope');
    const json = await getJsonResponse<ApiErrorResponse>(response);

    expect(response.status).toBe(404);
    assertError(json, 'NOT_FOUND');
    expect(json.error.message).toBe('Route GET /api/nope not found');
  });

  it('echoes an allowed origin in CORS headers', async () => {
    const response = await app.request('/health', {
      headers: { Origin: 'http://localhost:5173' },
    });

    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
  });
});
