/**
 * Analytics Worker
 *
 * Consumes queued telemetry records and appends them to the store. Runs in
 * the worker process when ANALYTICS_INGEST_MODE is QUEUE.
 */

import type { Job, Worker } from 'bullmq';
import { getTelemetryStore } from '@/lib/analytics/runtime';
import { newTelemetryRecordSchema } from '@/lib/analytics/schemas';
import type { TelemetryStore } from '@/lib/analytics/store';
import { env } from '@/lib/env';
import type { AnalyticsRecordJobData } from '@/lib/jobs/definitions';
import { createWorker } from '@/lib/jobs/queue';
import { logger } from '@/lib/logger';
import { incrementCounter } from '@/lib/monitoring/metrics';

// ============================================================================
// Job Processor
// ============================================================================

/**
 * Re-validate and append one record. Queue payloads cross a process
 * boundary, so they are checked again before they reach the store.
 */
export async function processAnalyticsRecord(
  job: Pick<Job<AnalyticsRecordJobData>, 'id' | 'name' | 'data'>,
  store: TelemetryStore = getTelemetryStore()
): Promise<void> {
  if (job.name !== 'analytics.record') {
    throw new Error(`Unknown job type: ${job.name}`);
  }

  const record = newTelemetryRecordSchema.parse(job.data.record);
  const id = await store.append(record);
  incrementCounter('analytics.worker.stored');

  logger.debug('Telemetry record stored', {
    jobId: job.id,
    recordId: id,
    endpoint: record.endpoint,
    queuedForMs: Date.now() - job.data.capturedAt,
  });
}

// ============================================================================
// Worker Lifecycle
// ============================================================================

let analyticsWorker: Worker<AnalyticsRecordJobData> | null = null;

export function startAnalyticsWorker(): void {
  if (analyticsWorker) return;

  if (env.ANALYTICS_STORE_DRIVER === 'MEMORY') {
    logger.warn('Analytics worker is using the in-memory store; records will not be shared');
  }

  analyticsWorker = createWorker<AnalyticsRecordJobData>({
    queueName: 'ANALYTICS',
    concurrency: env.ANALYTICS_QUEUE_CONCURRENCY,
    processor: (job) => processAnalyticsRecord(job),
  });

  logger.info('Analytics worker started', { concurrency: env.ANALYTICS_QUEUE_CONCURRENCY });
}

export async function stopAnalyticsWorker(): Promise<void> {
  if (analyticsWorker) {
    await analyticsWorker.close();
    analyticsWorker = null;
  }
  logger.info('Analytics worker stopped');
}

export function isAnalyticsWorkerRunning(): boolean {
  return analyticsWorker !== null;
}
