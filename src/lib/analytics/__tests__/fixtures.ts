import type { InMemoryTelemetryStore } from '../memory-store';
import type { GeoLocation, NewTelemetryRecord } from '../types';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export function minutesAgo(minutes: number, from: Date = NOW): Date {
  return new Date(from.getTime() - minutes * MINUTE);
}

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * HOUR);
}

export const US_GEO: GeoLocation = {
  country: 'United States',
  countryCode: 'US',
  region: 'California',
  city: 'San Francisco',
  latitude: 37.77,
  longitude: -122.42,
};

export const DE_GEO: GeoLocation = {
  country: 'Germany',
  countryCode: 'DE',
  region: 'Berlin',
  city: 'Berlin',
  latitude: 52.52,
  longitude: 13.4,
};

export function cityGeo(city: string, latitude: number, longitude: number): GeoLocation {
  return {
    country: 'France',
    countryCode: 'FR',
    region: 'Test Region',
    city,
    latitude,
    longitude,
  };
}

export function newRecord(overrides: Partial<NewTelemetryRecord> = {}): NewTelemetryRecord {
  return {
    endpoint: '/api/courses',
    method: 'GET',
    statusCode: 200,
    responseTimeMs: 100,
    ...overrides,
  };
}

/**
 * Mutable clock for InMemoryTelemetryStore, so records can be placed at
 * chosen instants
 */
export class TestClock {
  constructor(public current: Date = NOW) {}

  readonly now = (): Date => this.current;
}

export async function appendAt(
  store: InMemoryTelemetryStore,
  clock: TestClock,
  at: Date,
  record: NewTelemetryRecord
): Promise<number> {
  clock.current = at;
  const id = await store.append(record);
  clock.current = NOW;
  return id;
}
