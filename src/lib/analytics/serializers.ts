/**
 * JSON shapes returned by the reporting routes (snake_case, ISO timestamps)
 */

import type {
  AnalyticsReport,
  CityStat,
  CountryStat,
  EndpointStat,
  JsonValue,
  TelemetryRecord,
  TimeSeriesPoint,
  TrafficSummary,
} from './types';

export interface CountryStatJson {
  country: string;
  country_code: string;
  request_count: number;
  avg_response_time_ms: number;
  error_rate: number;
  unique_users: number;
}

export interface CityStatJson {
  city: string;
  region: string;
  country: string;
  request_count: number;
  latitude: number | null;
  longitude: number | null;
}

export interface EndpointStatJson {
  endpoint: string;
  method: string;
  total_calls: number;
  avg_response_time_ms: number;
  min_response_time_ms: number;
  max_response_time_ms: number;
  success_rate: number;
  error_rate: number;
  last_called: string;
}

export interface TrafficSummaryJson {
  total_requests: number;
  total_endpoints: number;
  avg_response_time_ms: number;
  total_errors: number;
  error_rate: number;
  requests_per_hour: number;
  most_called_endpoints: Array<{ endpoint: string; method: string; count: number }>;
  slowest_endpoints: Array<{ endpoint: string; method: string; avg_response_time_ms: number }>;
  status_code_distribution: Record<string, number>;
  method_distribution: Record<string, number>;
}

export interface TimeSeriesPointJson {
  timestamp: string;
  count: number;
  avg_response_time_ms: number;
}

export interface TelemetryRecordJson {
  id: number;
  endpoint: string;
  method: string;
  status_code: number;
  response_time_ms: number;
  user_id: string | null;
  ip_address: string | null;
  user_agent: string | null;
  request_size: number | null;
  response_size: number | null;
  country: string | null;
  country_code: string | null;
  region: string | null;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
  timezone: string | null;
  error_message: string | null;
  extra_data: Record<string, JsonValue> | null;
  created_at: string;
}

export interface AnalyticsReportJson {
  summary: TrafficSummaryJson;
  endpoint_stats: EndpointStatJson[];
  time_series: TimeSeriesPointJson[];
  recent_errors: TelemetryRecordJson[];
}

export function serializeCountryStat(stat: CountryStat): CountryStatJson {
  return {
    country: stat.country,
    country_code: stat.countryCode,
    request_count: stat.requestCount,
    avg_response_time_ms: stat.avgResponseTimeMs,
    error_rate: stat.errorRatePercent,
    unique_users: stat.uniqueUsers,
  };
}

export function serializeCityStat(stat: CityStat): CityStatJson {
  return {
    city: stat.city,
    region: stat.region,
    country: stat.country,
    request_count: stat.requestCount,
    latitude: stat.latitude,
    longitude: stat.longitude,
  };
}

export function serializeEndpointStat(stat: EndpointStat): EndpointStatJson {
  return {
    endpoint: stat.endpoint,
    method: stat.method,
    total_calls: stat.totalCalls,
    avg_response_time_ms: stat.avgResponseTimeMs,
    min_response_time_ms: stat.minResponseTimeMs,
    max_response_time_ms: stat.maxResponseTimeMs,
    success_rate: stat.successRatePercent,
    error_rate: stat.errorRatePercent,
    last_called: stat.lastCalledAt.toISOString(),
  };
}

export function serializeSummary(summary: TrafficSummary): TrafficSummaryJson {
  return {
    total_requests: summary.totalRequests,
    total_endpoints: summary.totalEndpoints,
    avg_response_time_ms: summary.avgResponseTimeMs,
    total_errors: summary.totalErrors,
    error_rate: summary.errorRatePercent,
    requests_per_hour: summary.requestsPerHour,
    most_called_endpoints: summary.mostCalledEndpoints,
    slowest_endpoints: summary.slowestEndpoints.map((entry) => ({
      endpoint: entry.endpoint,
      method: entry.method,
      avg_response_time_ms: entry.avgResponseTimeMs,
    })),
    status_code_distribution: summary.statusCodeDistribution,
    method_distribution: summary.methodDistribution,
  };
}

export function serializeTimeSeriesPoint(point: TimeSeriesPoint): TimeSeriesPointJson {
  return {
    timestamp: point.timestamp.toISOString(),
    count: point.count,
    avg_response_time_ms: point.avgResponseTimeMs,
  };
}

export function serializeRecord(record: TelemetryRecord): TelemetryRecordJson {
  return {
    id: record.id,
    endpoint: record.endpoint,
    method: record.method,
    status_code: record.statusCode,
    response_time_ms: record.responseTimeMs,
    user_id: record.userId,
    ip_address: record.ipAddress,
    user_agent: record.userAgent,
    request_size: record.requestSize,
    response_size: record.responseSize,
    country: record.country,
    country_code: record.countryCode,
    region: record.region,
    city: record.city,
    latitude: record.latitude,
    longitude: record.longitude,
    timezone: record.timezone,
    error_message: record.errorMessage,
    extra_data: record.extraData,
    created_at: record.createdAt.toISOString(),
  };
}

export function serializeReport(report: AnalyticsReport): AnalyticsReportJson {
  return {
    summary: serializeSummary(report.summary),
    endpoint_stats: report.endpointStats.map(serializeEndpointStat),
    time_series: report.timeSeries.map(serializeTimeSeriesPoint),
    recent_errors: report.recentErrors.map(serializeRecord),
  };
}

/**
 * Query-string value, with absent and empty parameters both read as undefined
 */
export function queryParam(searchParams: URLSearchParams, name: string): string | undefined {
  const value = searchParams.get(name);
  return value === null || value === '' ? undefined : value;
}
