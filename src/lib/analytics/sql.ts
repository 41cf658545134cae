/**
 * SQL generation for the `api_analytics` table.
 *
 * Only whitelisted column names are ever interpolated; every value travels as
 * a placeholder parameter.
 */

import type {
  Aggregate,
  Dimension,
  FindOptions,
  GroupQuery,
  NewTelemetryRecord,
  RecordSortField,
  TelemetryFilter,
} from './types';

export const TABLE_NAME = 'api_analytics';

export type SqlParam = string | number | Date | null;

export interface SqlStatement {
  sql: string;
  params: SqlParam[];
}

export const DIMENSION_COLUMNS: Record<Dimension, string> = {
  endpoint: 'endpoint',
  method: 'method',
  statusCode: 'status_code',
  userId: 'user_id',
  country: 'country',
  countryCode: 'country_code',
  region: 'region',
  city: 'city',
  latitude: 'latitude',
  longitude: 'longitude',
};

export const AGGREGATE_EXPRESSIONS: Record<Aggregate, string> = {
  requestCount: 'COUNT(*)',
  errorCount: 'SUM(CASE WHEN status_code >= 400 THEN 1 ELSE 0 END)',
  successCount: 'SUM(CASE WHEN status_code >= 200 AND status_code < 300 THEN 1 ELSE 0 END)',
  avgResponseTimeMs: 'AVG(response_time_ms)',
  minResponseTimeMs: 'MIN(response_time_ms)',
  maxResponseTimeMs: 'MAX(response_time_ms)',
  uniqueUsers: 'COUNT(DISTINCT user_id)',
  lastSeenAt: 'MAX(created_at)',
};

const SORT_COLUMNS: Record<RecordSortField, string> = {
  createdAt: 'created_at',
  responseTimeMs: 'response_time_ms',
  id: 'id',
};

const GEO_COLUMNS = ['country', 'country_code', 'region', 'city', 'latitude', 'longitude'];

export const RECORD_COLUMNS = [
  'id',
  'endpoint',
  'method',
  'status_code',
  'response_time_ms',
  'user_id',
  'ip_address',
  'user_agent',
  'request_size',
  'response_size',
  'country',
  'country_code',
  'region',
  'city',
  'latitude',
  'longitude',
  'timezone',
  'error_message',
  'extra_data',
  'created_at',
] as const;

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function buildWhere(filter: TelemetryFilter): SqlStatement {
  const conditions: string[] = [];
  const params: SqlParam[] = [];

  if (filter.since) {
    conditions.push('created_at >= ?');
    params.push(filter.since);
  }
  if (filter.until) {
    conditions.push('created_at < ?');
    params.push(filter.until);
  }
  if (filter.endpoint !== undefined) {
    conditions.push('endpoint = ?');
    params.push(filter.endpoint);
  }
  if (filter.endpointContains !== undefined) {
    conditions.push("endpoint LIKE CONCAT('%', ?, '%')");
    params.push(escapeLike(filter.endpointContains));
  }
  if (filter.method !== undefined) {
    conditions.push('method = ?');
    params.push(filter.method);
  }
  if (filter.statusCode !== undefined) {
    conditions.push('status_code = ?');
    params.push(filter.statusCode);
  }
  if (filter.minStatusCode !== undefined) {
    conditions.push('status_code >= ?');
    params.push(filter.minStatusCode);
  }
  if (filter.userId !== undefined) {
    conditions.push('user_id = ?');
    params.push(filter.userId);
  }
  if (filter.minResponseTimeMs !== undefined) {
    conditions.push('response_time_ms >= ?');
    params.push(filter.minResponseTimeMs);
  }
  if (filter.maxResponseTimeMs !== undefined) {
    conditions.push('response_time_ms <= ?');
    params.push(filter.maxResponseTimeMs);
  }
  if (filter.geoComplete) {
    for (const column of GEO_COLUMNS) {
      conditions.push(`${column} IS NOT NULL`);
    }
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/**
 * One grouped statement computing every requested aggregate in a single pass
 */
export function buildGroupQuery(query: GroupQuery): SqlStatement {
  const selectParts: string[] = [];
  const groupParts: string[] = [];
  const params: SqlParam[] = [];

  for (const dimension of query.groupBy) {
    selectParts.push(`${DIMENSION_COLUMNS[dimension]} AS \`${dimension}\``);
    groupParts.push(DIMENSION_COLUMNS[dimension]);
  }

  if (query.bucket) {
    selectParts.push('FLOOR(TIMESTAMPDIFF(MICROSECOND, ?, created_at) / 1000 / ?) AS `bucket`');
    params.push(query.bucket.origin, query.bucket.sizeMs);
    groupParts.push('`bucket`');
  }

  for (const aggregate of query.aggregates) {
    selectParts.push(`${AGGREGATE_EXPRESSIONS[aggregate]} AS \`${aggregate}\``);
  }

  const where = buildWhere(query.filter);
  params.push(...where.params);

  const lines = [`SELECT ${selectParts.join(', ')}`, `FROM ${TABLE_NAME}`];
  if (where.sql) lines.push(where.sql);
  if (groupParts.length > 0) lines.push(`GROUP BY ${groupParts.join(', ')}`);

  const orderParts: string[] = [];
  if (query.orderBy) {
    orderParts.push(`\`${query.orderBy.field}\` ${query.orderBy.direction.toUpperCase()}`);
  }
  // Group key as tie-break keeps repeated reads identical
  orderParts.push(...groupParts.map((column) => `${column} ASC`));
  if (orderParts.length > 0) lines.push(`ORDER BY ${orderParts.join(', ')}`);

  if (query.limit !== undefined) {
    lines.push('LIMIT ?');
    params.push(query.limit);
  }

  return { sql: lines.join(' '), params };
}

export function buildFindQuery(filter: TelemetryFilter, options: FindOptions = {}): SqlStatement {
  const where = buildWhere(filter);
  const { field, direction } = options.orderBy ?? { field: 'createdAt', direction: 'desc' };
  const dir = direction.toUpperCase();
  const params: SqlParam[] = [...where.params];

  const lines = [`SELECT ${RECORD_COLUMNS.join(', ')}`, `FROM ${TABLE_NAME}`];
  if (where.sql) lines.push(where.sql);
  lines.push(
    field === 'id' ? `ORDER BY id ${dir}` : `ORDER BY ${SORT_COLUMNS[field]} ${dir}, id ${dir}`
  );

  if (options.limit !== undefined || options.offset !== undefined) {
    // MySQL has no OFFSET without LIMIT
    lines.push('LIMIT ? OFFSET ?');
    params.push(options.limit ?? Number.MAX_SAFE_INTEGER, options.offset ?? 0);
  }

  return { sql: lines.join(' '), params };
}

/**
 * `created_at` is always bound from the caller's clock; the pool sends dates
 * as UTC, while a column default would follow the session time zone.
 */
export function buildInsert(record: NewTelemetryRecord, createdAt: Date): SqlStatement {
  const geo = record.geo;
  const values: Array<[string, SqlParam]> = [
    ['endpoint', record.endpoint],
    ['method', record.method],
    ['status_code', record.statusCode],
    ['response_time_ms', record.responseTimeMs],
    ['user_id', record.userId ?? null],
    ['ip_address', record.ipAddress ?? null],
    ['user_agent', record.userAgent ?? null],
    ['request_size', record.requestSize ?? null],
    ['response_size', record.responseSize ?? null],
    ['country', geo?.country ?? null],
    ['country_code', geo?.countryCode ?? null],
    ['region', geo?.region ?? null],
    ['city', geo?.city ?? null],
    ['latitude', geo?.latitude ?? null],
    ['longitude', geo?.longitude ?? null],
    ['timezone', geo?.timezone ?? null],
    ['error_message', record.errorMessage ?? null],
    ['extra_data', record.extraData ? JSON.stringify(record.extraData) : null],
    ['created_at', createdAt],
  ];

  return {
    sql: `INSERT INTO ${TABLE_NAME} (${values.map(([column]) => column).join(', ')}) VALUES (${values
      .map(() => '?')
      .join(', ')})`,
    params: values.map(([, value]) => value),
  };
}
