/**
 * Core Dashboard Module - Barrel Export
 *
 * Data aggregation for the dashboard views: Overview, Streams, Audience,
 * Content and Revenue. Each view is a JSON-ready structure built from the
 * tables of a DashboardDataSource.
 *
 * @example
 * ```typescript
 * import { DashboardDataAggregator, SampleDataSource } from './core/dashboard';
 *
 * const aggregator = new DashboardDataAggregator(new SampleDataSource(42));
 * const audience = await aggregator.getAudience('Last 90 Days');
 * console.log(audience.engagement.rows);
 * ```
 */

export { DashboardDataAggregator } from './dashboard-data';
export type { DashboardOptions } from './dashboard-data';
export { SampleDataSource } from './data-source';
export type { DashboardDataSource } from './data-source';

export type {
  ChartDataPoint,
  CategoryShare,
  HeatmapData,
  ViewPeriod,
  OverviewTotals,
  DashboardOverview,
  StreamsGranularity,
  StreamsPoint,
  StreamsView,
  AudienceView,
  SongSummary,
  SongDetail,
  ContentView,
  PlatformRevenue,
  RevenueProjection,
  RevenueView,
} from './types';
