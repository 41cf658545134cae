import { ApiError } from '@/lib/error-logging';
import type {
  FindOptions,
  GroupQuery,
  GroupedRow,
  NewTelemetryRecord,
  TelemetryFilter,
  TelemetryRecord,
} from './types';

/**
 * Append-only telemetry storage.
 *
 * Every operation rejects with `ApiError` code STORE_UNAVAILABLE when the
 * medium cannot be reached; reads reject with INVALID_FILTER for malformed
 * windows before touching the medium.
 */
export interface TelemetryStore {
  append(record: NewTelemetryRecord): Promise<number>;
  query(query: GroupQuery): Promise<GroupedRow[]>;
  find(filter: TelemetryFilter, options?: FindOptions): Promise<TelemetryRecord[]>;
  ping(): Promise<void>;
}

export const ERROR_STATUS_THRESHOLD = 400;

export function isErrorStatus(statusCode: number): boolean {
  return statusCode >= ERROR_STATUS_THRESHOLD;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}

export function assertValidFilter(filter: TelemetryFilter): void {
  if (filter.since && !isValidDate(filter.since)) {
    throw ApiError.invalidFilter('Window start is not a valid date');
  }
  if (filter.until && !isValidDate(filter.until)) {
    throw ApiError.invalidFilter('Window end is not a valid date');
  }
  if (filter.since && filter.until && filter.until.getTime() <= filter.since.getTime()) {
    throw ApiError.invalidFilter('Window must have a positive width', {
      since: filter.since.toISOString(),
      until: filter.until.toISOString(),
    });
  }
}

export function assertValidGroupQuery(query: GroupQuery): void {
  assertValidFilter(query.filter);
  if (query.bucket) {
    if (!isValidDate(query.bucket.origin) || !(query.bucket.sizeMs > 0)) {
      throw ApiError.invalidFilter('Bucket must have a valid origin and a positive width');
    }
  }
  if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 0)) {
    throw ApiError.invalidFilter('Limit must be a non-negative integer');
  }
}

export function assertValidFindOptions(options: FindOptions): void {
  for (const [name, value] of [['limit', options.limit], ['offset', options.offset]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw ApiError.invalidFilter(`${name} must be a non-negative integer`);
    }
  }
}
