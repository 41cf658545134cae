import type { Pool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { ApiError } from '@/lib/error-logging';
import { trackDbQuery } from '@/lib/performance';
import { jsonRecordSchema } from './schemas';
import { buildFindQuery, buildGroupQuery, buildInsert, type SqlStatement } from './sql';
import {
  assertValidFilter,
  assertValidFindOptions,
  assertValidGroupQuery,
  type TelemetryStore,
} from './store';
import type {
  DimensionValue,
  FindOptions,
  GroupQuery,
  GroupedRow,
  JsonValue,
  NewTelemetryRecord,
  TelemetryFilter,
  TelemetryRecord,
} from './types';

/** The slice of a mysql2 pool the store uses */
export type QueryPool = Pick<Pool, 'query'>;

function readNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function readString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : String(value);
}

function readDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function readDimension(value: unknown): DimensionValue {
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return Number(value);
  return null;
}

function readJsonRecord(value: unknown): Record<string, JsonValue> | null {
  if (value === null || value === undefined) return null;
  let candidate: unknown = value;
  if (typeof value === 'string') {
    try {
      candidate = JSON.parse(value);
    } catch {
      return null;
    }
  }
  const parsed = jsonRecordSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

export function mapRecordRow(row: RowDataPacket): TelemetryRecord {
  return {
    id: readNumber(row.id) ?? 0,
    endpoint: readString(row.endpoint) ?? '',
    method: readString(row.method) ?? '',
    statusCode: readNumber(row.status_code) ?? 0,
    responseTimeMs: readNumber(row.response_time_ms) ?? 0,
    userId: readString(row.user_id),
    ipAddress: readString(row.ip_address),
    userAgent: readString(row.user_agent),
    requestSize: readNumber(row.request_size),
    responseSize: readNumber(row.response_size),
    country: readString(row.country),
    countryCode: readString(row.country_code),
    region: readString(row.region),
    city: readString(row.city),
    latitude: readNumber(row.latitude),
    longitude: readNumber(row.longitude),
    timezone: readString(row.timezone),
    errorMessage: readString(row.error_message),
    extraData: readJsonRecord(row.extra_data),
    createdAt: readDate(row.created_at) ?? new Date(0),
  };
}

export function mapGroupedRow(row: RowDataPacket, query: GroupQuery): GroupedRow {
  const result: GroupedRow = { dimensions: {}, metrics: {} };
  for (const dimension of query.groupBy) {
    result.dimensions[dimension] = readDimension(row[dimension]);
  }
  for (const aggregate of query.aggregates) {
    result.metrics[aggregate] =
      aggregate === 'lastSeenAt'
        ? readDate(row[aggregate])?.getTime() ?? null
        : readNumber(row[aggregate]);
  }
  if (query.bucket) {
    result.bucket = readNumber(row.bucket) ?? 0;
  }
  return result;
}

/**
 * `api_analytics` table behind a mysql2 pool. Each report is a single grouped
 * statement; connection and driver failures surface as STORE_UNAVAILABLE.
 */
export interface MySqlTelemetryStoreOptions {
  /** Clock for created_at */
  now?: () => Date;
}

export class MySqlTelemetryStore implements TelemetryStore {
  private readonly now: () => Date;

  constructor(
    private readonly pool: QueryPool,
    options: MySqlTelemetryStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private async run<T extends RowDataPacket[] | ResultSetHeader>(
    name: string,
    statement: SqlStatement
  ): Promise<T> {
    try {
      return await trackDbQuery(name, async () => {
        const [result] = await this.pool.query<T>(statement.sql, statement.params);
        return result;
      });
    } catch (error) {
      throw ApiError.storeUnavailable(`Telemetry store ${name} failed`, error, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async append(record: NewTelemetryRecord): Promise<number> {
    const statement = buildInsert(record, this.now());
    const result = await this.run<ResultSetHeader>('analytics.append', statement);
    return result.insertId;
  }

  async query(query: GroupQuery): Promise<GroupedRow[]> {
    assertValidGroupQuery(query);
    const rows = await this.run<RowDataPacket[]>('analytics.query', buildGroupQuery(query));
    return rows.map((row) => mapGroupedRow(row, query));
  }

  async find(filter: TelemetryFilter, options: FindOptions = {}): Promise<TelemetryRecord[]> {
    assertValidFilter(filter);
    assertValidFindOptions(options);
    const rows = await this.run<RowDataPacket[]>('analytics.find', buildFindQuery(filter, options));
    return rows.map(mapRecordRow);
  }

  async ping(): Promise<void> {
    await this.run<RowDataPacket[]>('analytics.ping', { sql: 'SELECT 1', params: [] });
  }
}
