import { describe, it, expect, afterEach, vi } from 'vitest';
import { GET } from '../route';
import { InMemoryTelemetryStore } from '@/lib/analytics/memory-store';
import { StoreSink, TelemetryDispatcher } from '@/lib/analytics/dispatcher';
import {
  resetTelemetryRuntime,
  setTelemetryDispatcher,
  setTelemetryStore,
} from '@/lib/analytics/runtime';
import { ApiError } from '@/lib/error-logging';

describe('GET /api/health', () => {
  afterEach(() => {
    resetTelemetryRuntime();
  });

  it('should report healthy when the store answers', async () => {
    setTelemetryStore(new InMemoryTelemetryStore());

    const response = await GET();
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      status: 'healthy',
      components: { store: { status: 'healthy', driver: 'MEMORY' } },
      ingestion: { mode: 'DIRECT', inFlight: 0, dropped: 0, dropping: false, failed: 0 },
    });
  });

  it('should report unhealthy with 503 when the store is unreachable', async () => {
    const store = new InMemoryTelemetryStore();
    vi.spyOn(store, 'ping').mockRejectedValue(ApiError.storeUnavailable('Telemetry store analytics.ping failed'));
    setTelemetryStore(store);

    const response = await GET();
    const body = await response.json();

    expect(response.status).toBe(503);
    expect(body.status).toBe('unhealthy');
    expect(body.components.store).toEqual({
      status: 'unhealthy',
      driver: 'MEMORY',
      error: 'Telemetry store analytics.ping failed',
    });
  });

  it('should report degraded only while the telemetry backlog is full', async () => {
    const store = new InMemoryTelemetryStore();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const sink = new StoreSink(store);
    const dispatcher = new TelemetryDispatcher({
      sink: { write: async (record) => gate.then(() => sink.write(record)) },
      geoResolver: { resolve: vi.fn().mockResolvedValue(null) },
      maxInFlight: 1,
      identify: () => undefined,
    });
    setTelemetryStore(store);
    setTelemetryDispatcher(dispatcher);
    const capture = {
      endpoint: '/api/things',
      method: 'GET',
      statusCode: 200,
      responseTimeMs: 3,
      headers: new Headers(),
    };

    dispatcher.dispatch(capture);
    dispatcher.dispatch(capture);
    const during = await (await GET()).json();

    release();
    await dispatcher.drain();
    const after = await (await GET()).json();

    expect(during.status).toBe('degraded');
    expect(during.ingestion).toMatchObject({ inFlight: 1, dropped: 1, dropping: true });
    expect(after.status).toBe('healthy');
    expect(after.ingestion).toMatchObject({ inFlight: 0, dropped: 1, dropping: false });
  });
});
