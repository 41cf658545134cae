/**
 * Aggregation Engine
 *
 * Every report is derived from grouped store queries that compute all of its
 * counters in one pass (error counts ride along as a conditional sum rather
 * than one extra query per group). Rounding and rate derivation happen here,
 * after the store returns raw sums.
 */

import type { TelemetryStore } from './store';
import type {
  Aggregate,
  AnalyticsReport,
  CityStat,
  CountryStat,
  Dimension,
  EndpointStat,
  GroupedRow,
  SearchCriteria,
  TelemetryFilter,
  TelemetryRecord,
  TimeSeriesPoint,
  TimeWindow,
  TrafficSummary,
} from './types';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

export const DEFAULT_CITY_LIMIT = 20;
export const SUMMARY_TOP_ENDPOINTS = 10;
export const REPORT_RECENT_ERRORS = 20;
export const REPORT_INTERVAL_MINUTES = 60;

/**
 * `[now - hours, now)`
 */
export function windowForHours(hours: number, now: Date = new Date()): TimeWindow {
  return {
    since: new Date(now.getTime() - hours * HOUR_MS),
    until: new Date(now.getTime()),
  };
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Share of `part` in `total` as a percentage, 0 for an empty total
 */
export function percentage(part: number, total: number): number {
  return total > 0 ? round2((part / total) * 100) : 0;
}

function metric(row: GroupedRow | undefined, name: Aggregate): number {
  return row?.metrics[name] ?? 0;
}

function text(row: GroupedRow, name: Dimension): string {
  const value = row.dimensions[name];
  return value === null || value === undefined ? '' : String(value);
}

function numeric(row: GroupedRow, name: Dimension): number | null {
  const value = row.dimensions[name];
  return typeof value === 'number' ? value : null;
}

function windowFilter(window: TimeWindow): TelemetryFilter {
  return { since: window.since, until: window.until };
}

// =============================================================================
// Geography
// =============================================================================

export async function computeGeographicStats(
  store: TelemetryStore,
  window: TimeWindow
): Promise<CountryStat[]> {
  const rows = await store.query({
    filter: { ...windowFilter(window), geoComplete: true },
    groupBy: ['country', 'countryCode'],
    aggregates: ['requestCount', 'avgResponseTimeMs', 'uniqueUsers', 'errorCount'],
    orderBy: { field: 'requestCount', direction: 'desc' },
  });

  return rows.map((row) => {
    const requestCount = metric(row, 'requestCount');
    return {
      country: text(row, 'country'),
      countryCode: text(row, 'countryCode'),
      requestCount,
      avgResponseTimeMs: round2(metric(row, 'avgResponseTimeMs')),
      errorRatePercent: percentage(metric(row, 'errorCount'), requestCount),
      uniqueUsers: metric(row, 'uniqueUsers'),
    };
  });
}

/**
 * Groups by the literal (city, region, country, latitude, longitude) tuple,
 * so one city reported with different coordinates yields several entries.
 */
export async function computeCityStats(
  store: TelemetryStore,
  window: TimeWindow,
  limit: number = DEFAULT_CITY_LIMIT
): Promise<CityStat[]> {
  const rows = await store.query({
    filter: { ...windowFilter(window), geoComplete: true },
    groupBy: ['city', 'region', 'country', 'latitude', 'longitude'],
    aggregates: ['requestCount'],
    orderBy: { field: 'requestCount', direction: 'desc' },
    limit,
  });

  return rows.map((row) => ({
    city: text(row, 'city'),
    region: text(row, 'region'),
    country: text(row, 'country'),
    requestCount: metric(row, 'requestCount'),
    latitude: numeric(row, 'latitude'),
    longitude: numeric(row, 'longitude'),
  }));
}

// =============================================================================
// Traffic
// =============================================================================

function toEndpointStat(row: GroupedRow): EndpointStat {
  const totalCalls = metric(row, 'requestCount');
  return {
    endpoint: text(row, 'endpoint'),
    method: text(row, 'method'),
    totalCalls,
    avgResponseTimeMs: round2(metric(row, 'avgResponseTimeMs')),
    minResponseTimeMs: round2(metric(row, 'minResponseTimeMs')),
    maxResponseTimeMs: round2(metric(row, 'maxResponseTimeMs')),
    successRatePercent: percentage(metric(row, 'successCount'), totalCalls),
    errorRatePercent: percentage(metric(row, 'errorCount'), totalCalls),
    lastCalledAt: new Date(metric(row, 'lastSeenAt')),
  };
}

export async function computeEndpointStats(
  store: TelemetryStore,
  window: TimeWindow
): Promise<EndpointStat[]> {
  const rows = await store.query({
    filter: windowFilter(window),
    groupBy: ['endpoint', 'method'],
    aggregates: [
      'requestCount',
      'avgResponseTimeMs',
      'minResponseTimeMs',
      'maxResponseTimeMs',
      'successCount',
      'errorCount',
      'lastSeenAt',
    ],
    orderBy: { field: 'requestCount', direction: 'desc' },
  });

  return rows.map(toEndpointStat);
}

export async function computeSummary(
  store: TelemetryStore,
  window: TimeWindow,
  hours: number
): Promise<TrafficSummary> {
  const filter = windowFilter(window);

  const [totals, byEndpoint, byStatus, byMethod] = await Promise.all([
    store.query({
      filter,
      groupBy: [],
      aggregates: ['requestCount', 'errorCount', 'avgResponseTimeMs'],
    }),
    store.query({
      filter,
      groupBy: ['endpoint', 'method'],
      aggregates: ['requestCount', 'avgResponseTimeMs'],
      orderBy: { field: 'requestCount', direction: 'desc' },
    }),
    store.query({ filter, groupBy: ['statusCode'], aggregates: ['requestCount'] }),
    store.query({ filter, groupBy: ['method'], aggregates: ['requestCount'] }),
  ]);

  const totalRequests = metric(totals[0], 'requestCount');
  const totalErrors = metric(totals[0], 'errorCount');

  const mostCalledEndpoints = byEndpoint.slice(0, SUMMARY_TOP_ENDPOINTS).map((row) => ({
    endpoint: text(row, 'endpoint'),
    method: text(row, 'method'),
    count: metric(row, 'requestCount'),
  }));

  const slowestEndpoints = [...byEndpoint]
    .sort((a, b) => metric(b, 'avgResponseTimeMs') - metric(a, 'avgResponseTimeMs'))
    .slice(0, SUMMARY_TOP_ENDPOINTS)
    .map((row) => ({
      endpoint: text(row, 'endpoint'),
      method: text(row, 'method'),
      avgResponseTimeMs: round2(metric(row, 'avgResponseTimeMs')),
    }));

  const statusCodeDistribution: Record<string, number> = {};
  for (const row of byStatus) {
    statusCodeDistribution[text(row, 'statusCode')] = metric(row, 'requestCount');
  }

  const methodDistribution: Record<string, number> = {};
  for (const row of byMethod) {
    methodDistribution[text(row, 'method')] = metric(row, 'requestCount');
  }

  return {
    totalRequests,
    totalEndpoints: new Set(byEndpoint.map((row) => text(row, 'endpoint'))).size,
    avgResponseTimeMs: round2(metric(totals[0], 'avgResponseTimeMs')),
    totalErrors,
    errorRatePercent: percentage(totalErrors, totalRequests),
    requestsPerHour: hours > 0 ? round2(totalRequests / hours) : 0,
    mostCalledEndpoints,
    slowestEndpoints,
    statusCodeDistribution,
    methodDistribution,
  };
}

/**
 * Contiguous buckets of `intervalMinutes` starting at the window start; buckets
 * without traffic are reported with zeros.
 */
export async function computeTimeSeries(
  store: TelemetryStore,
  window: TimeWindow,
  intervalMinutes: number = REPORT_INTERVAL_MINUTES
): Promise<TimeSeriesPoint[]> {
  const sizeMs = intervalMinutes * MINUTE_MS;
  const rows = await store.query({
    filter: windowFilter(window),
    groupBy: [],
    aggregates: ['requestCount', 'avgResponseTimeMs'],
    bucket: { origin: window.since, sizeMs },
  });

  const byBucket = new Map<number, GroupedRow>();
  for (const row of rows) {
    if (row.bucket !== undefined) byBucket.set(row.bucket, row);
  }

  const origin = window.since.getTime();
  const bucketCount = Math.ceil((window.until.getTime() - origin) / sizeMs);
  const points: TimeSeriesPoint[] = [];
  for (let index = 0; index < bucketCount; index++) {
    const row = byBucket.get(index);
    points.push({
      timestamp: new Date(origin + index * sizeMs),
      count: metric(row, 'requestCount'),
      avgResponseTimeMs: round2(metric(row, 'avgResponseTimeMs')),
    });
  }
  return points;
}

// =============================================================================
// Raw rows
// =============================================================================

export function listRecentErrors(store: TelemetryStore, limit: number): Promise<TelemetryRecord[]> {
  return store.find(
    { minStatusCode: 400 },
    { orderBy: { field: 'createdAt', direction: 'desc' }, limit }
  );
}

export function listSlowRequests(
  store: TelemetryStore,
  thresholdMs: number,
  limit: number
): Promise<TelemetryRecord[]> {
  return store.find(
    { minResponseTimeMs: thresholdMs },
    { orderBy: { field: 'responseTimeMs', direction: 'desc' }, limit }
  );
}

/**
 * `endpoint` matches as a substring; `endDate` is inclusive
 */
export function searchRecords(
  store: TelemetryStore,
  criteria: SearchCriteria
): Promise<TelemetryRecord[]> {
  const filter: TelemetryFilter = {
    endpointContains: criteria.endpoint,
    method: criteria.method,
    statusCode: criteria.statusCode,
    userId: criteria.userId,
    minResponseTimeMs: criteria.minResponseTimeMs,
    maxResponseTimeMs: criteria.maxResponseTimeMs,
    since: criteria.startDate,
    until: criteria.endDate ? new Date(criteria.endDate.getTime() + 1) : undefined,
  };

  return store.find(filter, {
    orderBy: { field: 'createdAt', direction: 'desc' },
    limit: criteria.limit,
    offset: criteria.offset,
  });
}

export async function computeReport(
  store: TelemetryStore,
  window: TimeWindow,
  hours: number
): Promise<AnalyticsReport> {
  const [summary, endpointStats, timeSeries, recentErrors] = await Promise.all([
    computeSummary(store, window, hours),
    computeEndpointStats(store, window),
    computeTimeSeries(store, window, REPORT_INTERVAL_MINUTES),
    listRecentErrors(store, REPORT_RECENT_ERRORS),
  ]);

  return { summary, endpointStats, timeSeries, recentErrors };
}
