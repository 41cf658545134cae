import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockWorker = vi.hoisted(() => ({
  close: vi.fn().mockResolvedValue(undefined),
}));

vi.mock('@/lib/jobs/queue', () => ({
  createWorker: vi.fn(() => mockWorker),
}));

vi.mock('@/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import { InMemoryTelemetryStore } from '@/lib/analytics/memory-store';
import { createWorker } from '@/lib/jobs/queue';
import { getCounter } from '@/lib/monitoring/metrics';
import {
  isAnalyticsWorkerRunning,
  processAnalyticsRecord,
  startAnalyticsWorker,
  stopAnalyticsWorker,
} from '../analytics-worker';

const record = {
  endpoint: '/api/courses',
  method: 'GET',
  statusCode: 201,
  responseTimeMs: 8,
  userId: 'user-1',
};

describe('Analytics Worker', () => {
  let store: InMemoryTelemetryStore;

  beforeEach(() => {
    store = new InMemoryTelemetryStore();
  });

  describe('processAnalyticsRecord', () => {
    it('should append the queued record to the store', async () => {
      await processAnalyticsRecord(
        { id: 'job-1', name: 'analytics.record', data: { record, capturedAt: Date.now() } },
        store
      );

      const [stored] = await store.find({});
      expect(stored).toMatchObject({ id: 1, endpoint: '/api/courses', statusCode: 201, userId: 'user-1' });
      expect(getCounter('analytics.worker.stored')).toBe(1);
    });

    it('should reject unknown job names', async () => {
      await expect(
        processAnalyticsRecord(
          { id: 'job-2', name: 'something.else', data: { record, capturedAt: 0 } },
          store
        )
      ).rejects.toThrow('Unknown job type: something.else');
      expect(store.size()).toBe(0);
    });

    it('should reject a payload that is not a valid record', async () => {
      await expect(
        processAnalyticsRecord(
          {
            id: 'job-3',
            name: 'analytics.record',
            data: { record: { ...record, method: 'get' }, capturedAt: 0 },
          },
          store
        )
      ).rejects.toThrow();
      expect(store.size()).toBe(0);
    });
  });

  describe('worker lifecycle', () => {
    it('should start once and stop cleanly', async () => {
      startAnalyticsWorker();
      startAnalyticsWorker();

      expect(createWorker).toHaveBeenCalledTimes(1);
      expect(createWorker).toHaveBeenCalledWith(
        expect.objectContaining({ queueName: 'ANALYTICS', concurrency: 8 })
      );
      expect(isAnalyticsWorkerRunning()).toBe(true);

      await stopAnalyticsWorker();

      expect(mockWorker.close).toHaveBeenCalled();
      expect(isAnalyticsWorkerRunning()).toBe(false);
    });
  });
});
