import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { GET } from '../route';
import { StoreSink, TelemetryDispatcher } from '@/lib/analytics/dispatcher';
import { InMemoryTelemetryStore } from '@/lib/analytics/memory-store';
import {
  resetTelemetryRuntime,
  setTelemetryDispatcher,
  setTelemetryStore,
} from '@/lib/analytics/runtime';
import { createSessionToken } from '@/lib/auth/session-token';
import { US_GEO } from '@/lib/analytics/__tests__/fixtures';

function createRequest(query = '', token?: string): NextRequest {
  return new NextRequest(`http://localhost/api/analytics/geographic${query}`, {
    headers: token ? { authorization: `Bearer ${token}` } : {},
  });
}

describe('GET /api/analytics/geographic', () => {
  let store: InMemoryTelemetryStore;
  let dispatcher: TelemetryDispatcher;
  const adminToken = createSessionToken('admin-1', { roles: ['ADMIN'] });

  beforeEach(async () => {
    // Records land a minute in the past so they sit inside the half-open window
    store = new InMemoryTelemetryStore({ now: () => new Date(Date.now() - 60_000) });
    dispatcher = new TelemetryDispatcher({
      sink: new StoreSink(store),
      geoResolver: { resolve: vi.fn().mockResolvedValue(null) },
      maxInFlight: 16,
    });
    setTelemetryStore(store);
    setTelemetryDispatcher(dispatcher);

    await store.append({ endpoint: '/api/a', method: 'GET', statusCode: 200, responseTimeMs: 100, userId: 'u1', geo: US_GEO });
    await store.append({ endpoint: '/api/a', method: 'GET', statusCode: 500, responseTimeMs: 200, userId: 'u1', geo: US_GEO });
  });

  afterEach(async () => {
    await dispatcher.drain();
    resetTelemetryRuntime();
  });

  it('should return per-country statistics in snake_case', async () => {
    const response = await GET(createRequest('', adminToken), {});

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual([
      {
        country: 'United States',
        country_code: 'US',
        request_count: 2,
        avg_response_time_ms: 150,
        error_rate: 50,
        unique_users: 1,
      },
    ]);
  });

  it('should require a session token', async () => {
    const response = await GET(createRequest(), {});
    const body = await response.json();

    expect(response.status).toBe(401);
    expect(body.error.code).toBe('UNAUTHORIZED');
  });

  it('should refuse non-admin callers', async () => {
    const response = await GET(createRequest('', createSessionToken('user-1')), {});
    const body = await response.json();

    expect(response.status).toBe(403);
    expect(body.error.code).toBe('FORBIDDEN');
  });

  it('should reject a non-positive window', async () => {
    const response = await GET(createRequest('?hours=0', adminToken), {});
    const body = await response.json();

    expect(response.status).toBe(422);
    expect(body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'hours must be greater than 0',
    });
  });

  it('should record the report request itself', async () => {
    await GET(createRequest('?hours=12', adminToken), {});
    await dispatcher.drain();

    const [latest] = await store.find({ endpoint: '/api/analytics/geographic' });
    expect(latest).toMatchObject({ method: 'GET', statusCode: 200, userId: 'admin-1' });
  });
});
