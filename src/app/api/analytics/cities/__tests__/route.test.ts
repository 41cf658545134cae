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
import { cityGeo } from '@/lib/analytics/__tests__/fixtures';

function createRequest(query = '', token?: string): NextRequest {
  return new NextRequest(`http://localhost/api/analytics/cities${query}`, {
    headers: token ? { authorization: `Bearer ${token}` } : {},
  });
}

describe('GET /api/analytics/cities', () => {
  let store: InMemoryTelemetryStore;
  let dispatcher: TelemetryDispatcher;
  const adminToken = createSessionToken('admin-1', { roles: ['ADMIN'] });
  const paris = cityGeo('Paris', 48.86, 2.35);
  const lyon = cityGeo('Lyon', 45.76, 4.84);

  beforeEach(async () => {
    store = new InMemoryTelemetryStore({ now: () => new Date(Date.now() - 60_000) });
    dispatcher = new TelemetryDispatcher({
      sink: new StoreSink(store),
      geoResolver: { resolve: vi.fn().mockResolvedValue(null) },
      maxInFlight: 16,
    });
    setTelemetryStore(store);
    setTelemetryDispatcher(dispatcher);

    const base = { endpoint: '/api/a', method: 'GET', statusCode: 200, responseTimeMs: 10 };
    await store.append({ ...base, geo: lyon });
    await store.append({ ...base, geo: paris });
    await store.append({ ...base, geo: paris });
    await store.append(base);
  });

  afterEach(async () => {
    await dispatcher.drain();
    resetTelemetryRuntime();
  });

  it('should return located cities busiest first in snake_case', async () => {
    const response = await GET(createRequest('', adminToken), {});

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual([
      {
        city: 'Paris',
        region: 'Test Region',
        country: 'France',
        request_count: 2,
        latitude: 48.86,
        longitude: 2.35,
      },
      {
        city: 'Lyon',
        region: 'Test Region',
        country: 'France',
        request_count: 1,
        latitude: 45.76,
        longitude: 4.84,
      },
    ]);
  });

  it('should honour the limit', async () => {
    const response = await GET(createRequest('?limit=1', adminToken), {});
    const body = await response.json();

    expect(body.map((row: { city: string }) => row.city)).toEqual(['Paris']);
  });

  it('should refuse non-admin callers', async () => {
    const response = await GET(createRequest('', createSessionToken('user-1')), {});
    const body = await response.json();

    expect(response.status).toBe(403);
    expect(body.error.code).toBe('FORBIDDEN');
  });

  it('should reject a zero limit', async () => {
    const response = await GET(createRequest('?limit=0', adminToken), {});
    const body = await response.json();

    expect(response.status).toBe(422);
    expect(body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'limit must be greater than 0',
    });
  });
});
