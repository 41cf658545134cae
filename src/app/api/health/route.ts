import { NextResponse } from 'next/server';
import { getTelemetryDispatcher, getTelemetryStore } from '@/lib/analytics/runtime';
import { env } from '@/lib/env';
import { toError } from '@/lib/error-logging';
import { logger } from '@/lib/logger';
import { getCounter } from '@/lib/monitoring/metrics';
import { startTimer } from '@/lib/performance';

export const dynamic = 'force-dynamic';

const VERSION = process.env.npm_package_version || process.env.APP_VERSION || '1.0.0';

const APP_START_TIME = Date.now();

interface ComponentHealth {
  status: 'healthy' | 'unhealthy';
  driver?: string;
  latencyMs?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptimeSeconds: number;
  timestamp: string;
  components: {
    store: ComponentHealth;
  };
  ingestion: {
    mode: string;
    inFlight: number;
    dropped: number;
    dropping: boolean;
    failed: number;
  };
}

async function checkStore(): Promise<ComponentHealth> {
  const timer = startTimer('health:store', undefined, 5000);

  try {
    await getTelemetryStore().ping();
    const metrics = timer.end();
    return {
      status: 'healthy',
      driver: env.ANALYTICS_STORE_DRIVER,
      latencyMs: Math.round(metrics.duration * 100) / 100,
    };
  } catch (error) {
    timer.end({ error: true });
    logger.error('Telemetry store health check failed', toError(error));
    return {
      status: 'unhealthy',
      driver: env.ANALYTICS_STORE_DRIVER,
      error: toError(error).message,
    };
  }
}

/**
 * GET /api/health
 * Public liveness check; not itself recorded as telemetry
 */
export async function GET(): Promise<NextResponse<HealthResponse>> {
  const store = await checkStore();
  const dispatcher = getTelemetryDispatcher().stats();

  // Degraded only while the backlog is full
  const status: HealthResponse['status'] =
    store.status === 'unhealthy' ? 'unhealthy' : dispatcher.dropping ? 'degraded' : 'healthy';

  const response: HealthResponse = {
    status,
    version: VERSION,
    uptimeSeconds: Math.floor((Date.now() - APP_START_TIME) / 1000),
    timestamp: new Date().toISOString(),
    components: { store },
    ingestion: {
      mode: env.ANALYTICS_INGEST_MODE,
      inFlight: dispatcher.inFlight,
      dropped: dispatcher.dropped,
      dropping: dispatcher.dropping,
      failed: getCounter('analytics.telemetry.failed'),
    },
  };

  if (status === 'unhealthy') {
    logger.error('Health check failed', { status, storeStatus: store.status });
  } else if (status === 'degraded') {
    logger.warn('Health check degraded', { status, dropped: dispatcher.dropped });
  }

  return NextResponse.json(response, { status: status === 'unhealthy' ? 503 : 200 });
}
