import { describe, it, expect, vi, beforeEach } from 'vitest';
import { computeGeographicStats, windowForHours } from '../aggregation';
import { mapRecordRow, MySqlTelemetryStore } from '../mysql-store';
import { buildInsert } from '../sql';
import { ApiError, ErrorCode } from '@/lib/error-logging';
import { minutesAgo, newRecord, NOW } from './fixtures';

describe('MySqlTelemetryStore', () => {
  const query = vi.fn();
  let store: MySqlTelemetryStore;

  beforeEach(() => {
    query.mockReset();
    store = new MySqlTelemetryStore({ query }, { now: () => NOW });
  });

  it('should insert a record and return the generated id', async () => {
    query.mockResolvedValue([{ insertId: 42 }, []]);
    const record = newRecord({ userId: 'user-1' });

    await expect(store.append(record)).resolves.toBe(42);

    const expected = buildInsert(record, NOW);
    expect(query).toHaveBeenCalledWith(expected.sql, expected.params);
  });

  it('should bind created_at from its clock instead of the column default', async () => {
    query.mockResolvedValue([{ insertId: 1 }, []]);

    await store.append(newRecord());

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('extra_data, created_at) VALUES');
    expect(params[params.length - 1]).toEqual(new Date('2026-03-01T12:00:00.000Z'));
  });

  it('should map decimal strings from grouped rows to numbers', async () => {
    query.mockResolvedValue([
      [
        {
          country: 'United States',
          countryCode: 'US',
          requestCount: 3,
          avgResponseTimeMs: '200.3333',
          uniqueUsers: 2,
          errorCount: '1',
        },
      ],
      [],
    ]);

    const stats = await computeGeographicStats(store, windowForHours(24, NOW));

    expect(stats).toEqual([
      {
        country: 'United States',
        countryCode: 'US',
        requestCount: 3,
        avgResponseTimeMs: 200.33,
        errorRatePercent: 33.33,
        uniqueUsers: 2,
      },
    ]);
  });

  it('should report lastSeenAt in epoch milliseconds and read buckets', async () => {
    const lastSeen = minutesAgo(3);
    query.mockResolvedValue([[{ bucket: '2', requestCount: 4, lastSeenAt: lastSeen }], []]);

    const rows = await store.query({
      filter: {},
      groupBy: [],
      aggregates: ['requestCount', 'lastSeenAt'],
      bucket: { origin: minutesAgo(60), sizeMs: 60_000 },
    });

    expect(rows).toEqual([
      { dimensions: {}, metrics: { requestCount: 4, lastSeenAt: lastSeen.getTime() }, bucket: 2 },
    ]);
  });

  it('should wrap driver failures as STORE_UNAVAILABLE', async () => {
    query.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const error = await store.find({}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      code: ErrorCode.STORE_UNAVAILABLE,
      statusCode: 503,
      message: 'Telemetry store analytics.find failed',
    });
  });

  it('should reject an empty window before reaching the database', async () => {
    const error = await store
      .query({ filter: { since: NOW, until: NOW }, groupBy: [], aggregates: ['requestCount'] })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ code: ErrorCode.INVALID_FILTER, statusCode: 422 });
    expect(query).not.toHaveBeenCalled();
  });

  it('should ping with a trivial statement', async () => {
    query.mockResolvedValue([[{ 1: 1 }], []]);

    await store.ping();

    expect(query).toHaveBeenCalledWith('SELECT 1', []);
  });
});

describe('mapRecordRow', () => {
  it('should convert column types and parse extra data', () => {
    const createdAt = minutesAgo(1);

    const record = mapRecordRow({
      constructor: { name: 'RowDataPacket' },
      id: 7,
      endpoint: '/api/a',
      method: 'GET',
      status_code: 200,
      response_time_ms: '12.50',
      user_id: null,
      ip_address: '203.0.113.9',
      user_agent: null,
      request_size: null,
      response_size: 512,
      country: 'Germany',
      country_code: 'DE',
      region: 'Berlin',
      city: 'Berlin',
      latitude: '52.5200000',
      longitude: '13.4000000',
      timezone: null,
      error_message: null,
      extra_data: '{"plan":"pro"}',
      created_at: createdAt,
    });

    expect(record).toEqual({
      id: 7,
      endpoint: '/api/a',
      method: 'GET',
      statusCode: 200,
      responseTimeMs: 12.5,
      userId: null,
      ipAddress: '203.0.113.9',
      userAgent: null,
      requestSize: null,
      responseSize: 512,
      country: 'Germany',
      countryCode: 'DE',
      region: 'Berlin',
      city: 'Berlin',
      latitude: 52.52,
      longitude: 13.4,
      timezone: null,
      errorMessage: null,
      extraData: { plan: 'pro' },
      createdAt,
    });
  });
});
