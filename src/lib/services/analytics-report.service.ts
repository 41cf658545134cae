import type { z } from 'zod';
import {
  computeCityStats,
  computeEndpointStats,
  computeGeographicStats,
  computeReport,
  computeSummary,
  computeTimeSeries,
  listRecentErrors,
  listSlowRequests,
  searchRecords,
  windowForHours,
} from '@/lib/analytics/aggregation';
import { getTelemetryStore } from '@/lib/analytics/runtime';
import {
  cityParamsSchema,
  geographicParamsSchema,
  recentErrorsParamsSchema,
  searchParamsSchema,
  slowRequestsParamsSchema,
  timeSeriesParamsSchema,
  windowParamsSchema,
  type SearchParams,
} from '@/lib/analytics/schemas';
import type { TelemetryStore } from '@/lib/analytics/store';
import type {
  AnalyticsReport,
  CityStat,
  CountryStat,
  EndpointStat,
  TelemetryRecord,
  TimeSeriesPoint,
  TrafficSummary,
} from '@/lib/analytics/types';
import { assertAdmin, type Caller } from '@/lib/auth/guards';
import { env } from '@/lib/env';
import { ApiError, withTimeout } from '@/lib/error-logging';
import { THRESHOLDS, trackOperation } from '@/lib/performance';

/** Numeric report parameters arrive as numbers or raw query-string values */
export type NumericParam = number | string | undefined;

/** Search criteria as typed values or raw query-string values */
export type SearchInput = { [K in keyof SearchParams]?: SearchParams[K] | string };

export interface ReportOptions {
  store?: TelemetryStore;
  now?: Date;
  timeoutMs?: number;
}

function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw ApiError.validation(message, { fieldErrors: parsed.error.flatten().fieldErrors });
  }
  return parsed.data;
}

function run<T>(
  name: string,
  caller: Caller,
  options: ReportOptions,
  fn: (store: TelemetryStore) => Promise<T>
): Promise<T> {
  const store = options.store ?? getTelemetryStore();
  return trackOperation(
    `analytics.report.${name}`,
    () => withTimeout(fn(store), options.timeoutMs ?? env.ANALYTICS_REPORT_TIMEOUT_MS, name),
    { userId: caller.userId },
    THRESHOLDS.SLOW_REPORT
  );
}

/**
 * Per-country request volume, latency, error rate and distinct users over
 * the last `hours`, busiest country first. Only fully located records count.
 */
export async function getGeographicStats(
  caller: Caller | null,
  hours?: NumericParam,
  options: ReportOptions = {}
): Promise<CountryStat[]> {
  assertAdmin(caller);
  const params = parseParams(geographicParamsSchema, { hours });
  const window = windowForHours(params.hours, options.now);
  return run('geographic', caller, options, (store) => computeGeographicStats(store, window));
}

export async function getCityStats(
  caller: Caller | null,
  hours?: NumericParam,
  limit?: NumericParam,
  options: ReportOptions = {}
): Promise<CityStat[]> {
  assertAdmin(caller);
  const params = parseParams(cityParamsSchema, { hours, limit });
  const window = windowForHours(params.hours, options.now);
  return run('cities', caller, options, (store) => computeCityStats(store, window, params.limit));
}

export async function getTrafficSummary(
  caller: Caller | null,
  hours?: NumericParam,
  options: ReportOptions = {}
): Promise<TrafficSummary> {
  assertAdmin(caller);
  const params = parseParams(windowParamsSchema, { hours });
  const window = windowForHours(params.hours, options.now);
  return run('summary', caller, options, (store) => computeSummary(store, window, params.hours));
}

export async function getEndpointStats(
  caller: Caller | null,
  hours?: NumericParam,
  options: ReportOptions = {}
): Promise<EndpointStat[]> {
  assertAdmin(caller);
  const params = parseParams(windowParamsSchema, { hours });
  const window = windowForHours(params.hours, options.now);
  return run('endpoints', caller, options, (store) => computeEndpointStats(store, window));
}

export async function getTimeSeries(
  caller: Caller | null,
  hours?: NumericParam,
  intervalMinutes?: NumericParam,
  options: ReportOptions = {}
): Promise<TimeSeriesPoint[]> {
  assertAdmin(caller);
  const params = parseParams(timeSeriesParamsSchema, { hours, intervalMinutes });
  const window = windowForHours(params.hours, options.now);
  return run('time-series', caller, options, (store) =>
    computeTimeSeries(store, window, params.intervalMinutes)
  );
}

export async function getRecentErrors(
  caller: Caller | null,
  limit?: NumericParam,
  options: ReportOptions = {}
): Promise<TelemetryRecord[]> {
  assertAdmin(caller);
  const params = parseParams(recentErrorsParamsSchema, { limit });
  return run('recent-errors', caller, options, (store) => listRecentErrors(store, params.limit));
}

export async function getSlowRequests(
  caller: Caller | null,
  thresholdMs?: NumericParam,
  limit?: NumericParam,
  options: ReportOptions = {}
): Promise<TelemetryRecord[]> {
  assertAdmin(caller);
  const params = parseParams(slowRequestsParamsSchema, { thresholdMs, limit });
  return run('slow-requests', caller, options, (store) =>
    listSlowRequests(store, params.thresholdMs, params.limit)
  );
}

/**
 * Filtered raw records, newest first. `endpoint` matches as a substring.
 */
export async function searchTelemetry(
  caller: Caller | null,
  criteria: SearchInput,
  options: ReportOptions = {}
): Promise<TelemetryRecord[]> {
  assertAdmin(caller);
  const params = parseParams(searchParamsSchema, criteria);
  return run('search', caller, options, (store) => searchRecords(store, params));
}

export async function getAnalyticsReport(
  caller: Caller | null,
  hours?: NumericParam,
  options: ReportOptions = {}
): Promise<AnalyticsReport> {
  assertAdmin(caller);
  const params = parseParams(windowParamsSchema, { hours });
  const window = windowForHours(params.hours, options.now);
  return run('report', caller, options, (store) => computeReport(store, window, params.hours));
}
