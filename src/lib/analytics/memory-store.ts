import {
  assertValidFindOptions,
  assertValidGroupQuery,
  assertValidFilter,
  isErrorStatus,
  isSuccessStatus,
  type TelemetryStore,
} from './store';
import {
  AGGREGATES,
  type Aggregate,
  type Dimension,
  type DimensionValue,
  type FindOptions,
  type GroupQuery,
  type GroupedRow,
  type NewTelemetryRecord,
  type SortDirection,
  type TelemetryFilter,
  type TelemetryRecord,
} from './types';

interface Accumulator {
  dimensions: Partial<Record<Dimension, DimensionValue>>;
  bucket?: number;
  count: number;
  errors: number;
  successes: number;
  totalResponseTime: number;
  minResponseTime: number;
  maxResponseTime: number;
  users: Set<string>;
  lastSeen: number;
}

export interface InMemoryTelemetryStoreOptions {
  /** Clock used to stamp `createdAt` */
  now?: () => Date;
}

export function hasCompleteGeo(record: TelemetryRecord): boolean {
  return (
    record.country !== null &&
    record.countryCode !== null &&
    record.region !== null &&
    record.city !== null &&
    record.latitude !== null &&
    record.longitude !== null
  );
}

export function matchesFilter(record: TelemetryRecord, filter: TelemetryFilter): boolean {
  const createdAt = record.createdAt.getTime();
  if (filter.since && createdAt < filter.since.getTime()) return false;
  if (filter.until && createdAt >= filter.until.getTime()) return false;
  if (filter.endpoint !== undefined && record.endpoint !== filter.endpoint) return false;
  if (filter.endpointContains !== undefined && !record.endpoint.includes(filter.endpointContains)) {
    return false;
  }
  if (filter.method !== undefined && record.method !== filter.method) return false;
  if (filter.statusCode !== undefined && record.statusCode !== filter.statusCode) return false;
  if (filter.minStatusCode !== undefined && record.statusCode < filter.minStatusCode) return false;
  if (filter.userId !== undefined && record.userId !== filter.userId) return false;
  if (filter.minResponseTimeMs !== undefined && record.responseTimeMs < filter.minResponseTimeMs) {
    return false;
  }
  if (filter.maxResponseTimeMs !== undefined && record.responseTimeMs > filter.maxResponseTimeMs) {
    return false;
  }
  if (filter.geoComplete && !hasCompleteGeo(record)) return false;
  return true;
}

/**
 * Code point order, which is what utf8mb4_bin gives; plain `<` compares
 * UTF-16 code units and misplaces characters outside the BMP
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    i += left > 0xffff ? 2 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

/**
 * Ascending order with nulls first, the way MySQL orders grouped columns
 */
function compareValues(a: DimensionValue | undefined, b: DimensionValue | undefined): number {
  const left = a ?? null;
  const right = b ?? null;
  if (left === right) return 0;
  if (left === null) return -1;
  if (right === null) return 1;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  return compareCodePoints(String(left), String(right));
}

function directed(result: number, direction: SortDirection): number {
  return direction === 'desc' ? -result : result;
}

function toMetrics(acc: Accumulator, aggregates: readonly Aggregate[]): GroupedRow['metrics'] {
  const metrics: GroupedRow['metrics'] = {};
  for (const aggregate of aggregates) {
    switch (aggregate) {
      case 'requestCount':
        metrics.requestCount = acc.count;
        break;
      case 'errorCount':
        metrics.errorCount = acc.errors;
        break;
      case 'successCount':
        metrics.successCount = acc.successes;
        break;
      case 'avgResponseTimeMs':
        metrics.avgResponseTimeMs = acc.count > 0 ? acc.totalResponseTime / acc.count : null;
        break;
      case 'minResponseTimeMs':
        metrics.minResponseTimeMs = acc.count > 0 ? acc.minResponseTime : null;
        break;
      case 'maxResponseTimeMs':
        metrics.maxResponseTimeMs = acc.count > 0 ? acc.maxResponseTime : null;
        break;
      case 'uniqueUsers':
        metrics.uniqueUsers = acc.users.size;
        break;
      case 'lastSeenAt':
        metrics.lastSeenAt = acc.count > 0 ? acc.lastSeen : null;
        break;
    }
  }
  return metrics;
}

/**
 * Process-local telemetry store with the same query semantics as the SQL
 * store. Used in development, tests, and when no database is configured.
 */
export class InMemoryTelemetryStore implements TelemetryStore {
  private records: TelemetryRecord[] = [];
  private nextId = 1;
  private readonly now: () => Date;

  constructor(options: InMemoryTelemetryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async append(record: NewTelemetryRecord): Promise<number> {
    const id = this.nextId++;
    const geo = record.geo;
    this.records.push({
      id,
      endpoint: record.endpoint,
      method: record.method,
      statusCode: record.statusCode,
      responseTimeMs: record.responseTimeMs,
      userId: record.userId ?? null,
      ipAddress: record.ipAddress ?? null,
      userAgent: record.userAgent ?? null,
      requestSize: record.requestSize ?? null,
      responseSize: record.responseSize ?? null,
      country: geo?.country ?? null,
      countryCode: geo?.countryCode ?? null,
      region: geo?.region ?? null,
      city: geo?.city ?? null,
      latitude: geo?.latitude ?? null,
      longitude: geo?.longitude ?? null,
      timezone: geo?.timezone ?? null,
      errorMessage: record.errorMessage ?? null,
      extraData: record.extraData ? structuredClone(record.extraData) : null,
      createdAt: new Date(this.now().getTime()),
    });
    return id;
  }

  async query(query: GroupQuery): Promise<GroupedRow[]> {
    assertValidGroupQuery(query);

    const groups = new Map<string, Accumulator>();

    for (const record of this.records) {
      if (!matchesFilter(record, query.filter)) continue;

      const dimensions: Partial<Record<Dimension, DimensionValue>> = {};
      for (const dimension of query.groupBy) {
        dimensions[dimension] = record[dimension];
      }
      const createdAt = record.createdAt.getTime();
      const bucket = query.bucket
        ? Math.floor((createdAt - query.bucket.origin.getTime()) / query.bucket.sizeMs)
        : undefined;

      const key = JSON.stringify([query.groupBy.map((d) => dimensions[d]), bucket]);
      let acc = groups.get(key);
      if (!acc) {
        acc = {
          dimensions,
          bucket,
          count: 0,
          errors: 0,
          successes: 0,
          totalResponseTime: 0,
          minResponseTime: Number.POSITIVE_INFINITY,
          maxResponseTime: Number.NEGATIVE_INFINITY,
          users: new Set(),
          lastSeen: Number.NEGATIVE_INFINITY,
        };
        groups.set(key, acc);
      }

      acc.count += 1;
      if (isErrorStatus(record.statusCode)) acc.errors += 1;
      if (isSuccessStatus(record.statusCode)) acc.successes += 1;
      acc.totalResponseTime += record.responseTimeMs;
      acc.minResponseTime = Math.min(acc.minResponseTime, record.responseTimeMs);
      acc.maxResponseTime = Math.max(acc.maxResponseTime, record.responseTimeMs);
      if (record.userId !== null) acc.users.add(record.userId);
      acc.lastSeen = Math.max(acc.lastSeen, createdAt);
    }

    const rows: GroupedRow[] = [...groups.values()].map((acc) => ({
      dimensions: acc.dimensions,
      metrics: toMetrics(acc, query.aggregates),
      ...(acc.bucket !== undefined ? { bucket: acc.bucket } : {}),
    }));

    const byGroupKey = (a: GroupedRow, b: GroupedRow): number => {
      for (const dimension of query.groupBy) {
        const result = compareValues(a.dimensions[dimension], b.dimensions[dimension]);
        if (result !== 0) return result;
      }
      return compareValues(a.bucket, b.bucket);
    };

    const orderBy = query.orderBy;
    rows.sort((a, b) => {
      if (orderBy) {
        const { field, direction } = orderBy;
        const primary = isAggregateField(field)
          ? compareValues(a.metrics[field], b.metrics[field])
          : compareValues(a.dimensions[field], b.dimensions[field]);
        if (primary !== 0) return directed(primary, direction);
      }
      return byGroupKey(a, b);
    });

    return query.limit !== undefined ? rows.slice(0, query.limit) : rows;
  }

  async find(filter: TelemetryFilter, options: FindOptions = {}): Promise<TelemetryRecord[]> {
    assertValidFilter(filter);
    assertValidFindOptions(options);

    const { field, direction } = options.orderBy ?? { field: 'createdAt', direction: 'desc' };
    const valueOf = (record: TelemetryRecord): number =>
      field === 'createdAt' ? record.createdAt.getTime() : record[field];

    const matching = this.records
      .filter((record) => matchesFilter(record, filter))
      .sort((a, b) => {
        const primary = valueOf(a) - valueOf(b);
        return directed(primary !== 0 ? primary : a.id - b.id, direction);
      });

    const offset = options.offset ?? 0;
    const end = options.limit !== undefined ? offset + options.limit : undefined;
    return matching.slice(offset, end).map((record) => structuredClone(record));
  }

  async ping(): Promise<void> {
    // Always reachable
  }

  clear(): void {
    this.records = [];
    this.nextId = 1;
  }

  size(): number {
    return this.records.length;
  }
}

function isAggregateField(field: Aggregate | Dimension): field is Aggregate {
  return AGGREGATES.some((aggregate) => aggregate === field);
}
