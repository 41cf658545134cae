import { closePool, getPool } from '@/lib/db';
import { env } from '@/lib/env';
import { closeQueues, QueueSink } from '@/lib/jobs/queue';
import { logger } from '@/lib/logger';
import { StoreSink, TelemetryDispatcher, type TelemetrySink } from './dispatcher';
import { CachedGeoResolver, HeaderGeoResolver } from './geo';
import { InMemoryTelemetryStore } from './memory-store';
import { MySqlTelemetryStore } from './mysql-store';
import type { TelemetryStore } from './store';

// Survive module reloads in development, like the connection pool
const globalForAnalytics = globalThis as unknown as {
  telemetryStore: TelemetryStore | undefined;
  telemetryDispatcher: TelemetryDispatcher | undefined;
};

function createTelemetryStore(): TelemetryStore {
  if (env.ANALYTICS_STORE_DRIVER === 'MYSQL') {
    logger.info('Using MySQL telemetry store');
    return new MySqlTelemetryStore(getPool());
  }
  logger.info('Using in-memory telemetry store');
  return new InMemoryTelemetryStore();
}

export function getTelemetryStore(): TelemetryStore {
  globalForAnalytics.telemetryStore ??= createTelemetryStore();
  return globalForAnalytics.telemetryStore;
}

export function setTelemetryStore(store: TelemetryStore): void {
  globalForAnalytics.telemetryStore = store;
}

function createSink(): TelemetrySink {
  if (env.ANALYTICS_INGEST_MODE === 'QUEUE') {
    return new QueueSink();
  }
  return new StoreSink(getTelemetryStore());
}

export function getTelemetryDispatcher(): TelemetryDispatcher {
  globalForAnalytics.telemetryDispatcher ??= new TelemetryDispatcher({
    sink: createSink(),
    geoResolver: new CachedGeoResolver(new HeaderGeoResolver()),
    maxInFlight: env.ANALYTICS_MAX_IN_FLIGHT,
  });
  return globalForAnalytics.telemetryDispatcher;
}

export function setTelemetryDispatcher(dispatcher: TelemetryDispatcher): void {
  globalForAnalytics.telemetryDispatcher = dispatcher;
}

/**
 * Forget the cached store and dispatcher; the next access rebuilds them from env
 */
export function resetTelemetryRuntime(): void {
  globalForAnalytics.telemetryStore = undefined;
  globalForAnalytics.telemetryDispatcher = undefined;
}

/**
 * Flush accepted captures, then release the connections the runtime opened
 */
export async function shutdownTelemetry(): Promise<void> {
  const dispatcher = globalForAnalytics.telemetryDispatcher;
  if (dispatcher) {
    logger.info('Draining telemetry backlog', { ...dispatcher.stats() });
    await dispatcher.drain();
  }

  if (env.ANALYTICS_INGEST_MODE === 'QUEUE') {
    await closeQueues();
  }
  if (env.ANALYTICS_STORE_DRIVER === 'MYSQL') {
    await closePool();
  }
}
