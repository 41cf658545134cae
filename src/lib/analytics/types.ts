/**
 * Telemetry record and aggregate types shared by the store, ingestion path,
 * aggregation engine and reporting surface.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface GeoLocation {
  country: string;
  countryCode: string;
  region: string;
  city: string;
  latitude: number;
  longitude: number;
  timezone?: string;
}

/**
 * A record as handed to the store; `id` and `createdAt` are assigned on append
 */
export interface NewTelemetryRecord {
  endpoint: string;
  method: string;
  statusCode: number;
  responseTimeMs: number;
  userId?: string;
  ipAddress?: string;
  userAgent?: string;
  requestSize?: number;
  responseSize?: number;
  geo?: GeoLocation;
  errorMessage?: string;
  extraData?: Record<string, JsonValue>;
}

export interface TelemetryRecord {
  id: number;
  endpoint: string;
  method: string;
  statusCode: number;
  responseTimeMs: number;
  userId: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  requestSize: number | null;
  responseSize: number | null;
  country: string | null;
  countryCode: string | null;
  region: string | null;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
  timezone: string | null;
  errorMessage: string | null;
  extraData: Record<string, JsonValue> | null;
  createdAt: Date;
}

// =============================================================================
// Store query model
// =============================================================================

/**
 * Half-open `[since, until)` interval on `createdAt`
 */
export interface TimeWindow {
  since: Date;
  until: Date;
}

export interface TelemetryFilter {
  since?: Date;
  until?: Date;
  endpoint?: string;
  endpointContains?: string;
  method?: string;
  statusCode?: number;
  minStatusCode?: number;
  userId?: string;
  minResponseTimeMs?: number;
  maxResponseTimeMs?: number;
  /** Only rows whose geo tuple is fully populated */
  geoComplete?: boolean;
}

export const DIMENSIONS = [
  'endpoint',
  'method',
  'statusCode',
  'userId',
  'country',
  'countryCode',
  'region',
  'city',
  'latitude',
  'longitude',
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export const AGGREGATES = [
  'requestCount',
  'errorCount',
  'successCount',
  'avgResponseTimeMs',
  'minResponseTimeMs',
  'maxResponseTimeMs',
  'uniqueUsers',
  'lastSeenAt',
] as const;

export type Aggregate = (typeof AGGREGATES)[number];

export type DimensionValue = string | number | null;

export type SortDirection = 'asc' | 'desc';

export interface GroupQuery {
  filter: TelemetryFilter;
  groupBy: readonly Dimension[];
  aggregates: readonly Aggregate[];
  orderBy?: { field: Aggregate | Dimension; direction: SortDirection };
  limit?: number;
  /** Fixed-width time buckets counted from `origin`; adds `bucket` to each row */
  bucket?: { origin: Date; sizeMs: number };
}

export interface GroupedRow {
  dimensions: Partial<Record<Dimension, DimensionValue>>;
  /** `lastSeenAt` is reported as epoch milliseconds */
  metrics: Partial<Record<Aggregate, number | null>>;
  bucket?: number;
}

export type RecordSortField = 'createdAt' | 'responseTimeMs' | 'id';

export interface FindOptions {
  orderBy?: { field: RecordSortField; direction: SortDirection };
  limit?: number;
  offset?: number;
}

// =============================================================================
// Derived statistics
// =============================================================================

export interface CountryStat {
  country: string;
  countryCode: string;
  requestCount: number;
  avgResponseTimeMs: number;
  errorRatePercent: number;
  uniqueUsers: number;
}

export interface CityStat {
  city: string;
  region: string;
  country: string;
  requestCount: number;
  latitude: number | null;
  longitude: number | null;
}

export interface EndpointCount {
  endpoint: string;
  method: string;
  count: number;
}

export interface EndpointLatency {
  endpoint: string;
  method: string;
  avgResponseTimeMs: number;
}

export interface TrafficSummary {
  totalRequests: number;
  totalEndpoints: number;
  avgResponseTimeMs: number;
  totalErrors: number;
  errorRatePercent: number;
  requestsPerHour: number;
  mostCalledEndpoints: EndpointCount[];
  slowestEndpoints: EndpointLatency[];
  statusCodeDistribution: Record<string, number>;
  methodDistribution: Record<string, number>;
}

export interface EndpointStat {
  endpoint: string;
  method: string;
  totalCalls: number;
  avgResponseTimeMs: number;
  minResponseTimeMs: number;
  maxResponseTimeMs: number;
  successRatePercent: number;
  errorRatePercent: number;
  lastCalledAt: Date;
}

export interface TimeSeriesPoint {
  timestamp: Date;
  count: number;
  avgResponseTimeMs: number;
}

export interface AnalyticsReport {
  summary: TrafficSummary;
  endpointStats: EndpointStat[];
  timeSeries: TimeSeriesPoint[];
  recentErrors: TelemetryRecord[];
}

export interface SearchCriteria {
  endpoint?: string;
  method?: string;
  statusCode?: number;
  userId?: string;
  minResponseTimeMs?: number;
  maxResponseTimeMs?: number;
  startDate?: Date;
  endDate?: Date;
  limit: number;
  offset: number;
}
