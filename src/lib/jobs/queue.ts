/**
 * Redis-backed Job Queue
 *
 * BullMQ queues for telemetry records that are persisted by a separate
 * worker process:
 * - Named queues with per-job retry configuration
 * - Dead letter queue for records that exhausted their retries
 * - Queue statistics for the health endpoint
 * - Graceful shutdown support
 */

import { Queue, Worker, type Job } from 'bullmq';
import Redis from 'ioredis';
import type { TelemetrySink } from '@/lib/analytics/dispatcher';
import type { NewTelemetryRecord } from '@/lib/analytics/types';
import { env } from '@/lib/env';
import { toError } from '@/lib/error-logging';
import { logger } from '@/lib/logger';
import {
  QUEUE_KEYS,
  QUEUE_NAMES,
  getJobOptions,
  getQueueKeyForJob,
  type JobType,
  type JobTypeNameMap,
  type QueueKey,
} from './definitions';

// ============================================================================
// Redis Connection
// ============================================================================

const createRedisConnection = (): Redis => {
  return new Redis(env.REDIS_URL, {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: false,
  });
};

let redisConnection: Redis | null = null;

function getRedisConnection(): Redis {
  if (!redisConnection) {
    redisConnection = createRedisConnection();
  }
  return redisConnection;
}

// ============================================================================
// Queue Instances
// ============================================================================

const queues = new Map<QueueKey, Queue>();

/**
 * Initialize all queues. Safe to call more than once.
 */
export function initializeQueues(): void {
  if (queues.size > 0) return;

  const connection = getRedisConnection();
  for (const key of QUEUE_KEYS) {
    queues.set(key, new Queue(QUEUE_NAMES[key], { connection }));
  }

  logger.info('Job queues initialized', { queues: Object.values(QUEUE_NAMES) });
}

export function getQueue(key: QueueKey): Queue | null {
  return queues.get(key) ?? null;
}

// ============================================================================
// Job Queueing Functions
// ============================================================================

/**
 * Add a job to the appropriate queue
 */
export async function addJob<T extends JobType>(
  jobType: T,
  data: JobTypeNameMap[T]
): Promise<Job> {
  const key = getQueueKeyForJob(jobType);
  const queue = getQueue(key);

  if (!queue) {
    throw new Error(`Queue not initialized: ${QUEUE_NAMES[key]}`);
  }

  const job = await queue.add(jobType, data, getJobOptions(jobType));
  logger.debug(`Job added: ${jobType}`, { jobId: job.id, queue: QUEUE_NAMES[key] });

  return job;
}

export async function queueTelemetryRecord(record: NewTelemetryRecord): Promise<Job> {
  return addJob('analytics.record', { record, capturedAt: Date.now() });
}

/**
 * Dispatcher sink that hands records to the worker process
 */
export class QueueSink implements TelemetrySink {
  constructor() {
    initializeQueues();
  }

  async write(record: NewTelemetryRecord): Promise<void> {
    await queueTelemetryRecord(record);
  }
}

// ============================================================================
// Queue Statistics
// ============================================================================

export interface QueueStats {
  name: string;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueueStats(key: QueueKey): Promise<QueueStats | null> {
  const queue = getQueue(key);
  if (!queue) return null;

  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return {
    name: QUEUE_NAMES[key],
    waiting,
    active,
    completed,
    failed,
    delayed,
  };
}

export async function getAllQueueStats(): Promise<QueueStats[]> {
  const stats: QueueStats[] = [];

  for (const key of QUEUE_KEYS) {
    const stat = await getQueueStats(key);
    if (stat) stats.push(stat);
  }

  return stats;
}

// ============================================================================
// Dead Letter Queue
// ============================================================================

/**
 * Move a failed job to the dead letter queue
 */
export type DeadLetterSource = Pick<Job, 'id' | 'queueName' | 'name' | 'data' | 'attemptsMade'>;

export async function moveToDeadLetterQueue(job: DeadLetterSource, reason: string): Promise<void> {
  const dlq = getQueue('DEAD_LETTER');
  if (!dlq) {
    logger.error('Dead letter queue not initialized');
    return;
  }

  await dlq.add(
    'dead-letter',
    {
      originalJobId: job.id,
      originalQueue: job.queueName,
      originalName: job.name,
      originalData: job.data,
      failedReason: reason,
      failedAt: new Date().toISOString(),
      attemptsMade: job.attemptsMade,
    },
    {
      removeOnComplete: 1000,
      removeOnFail: false,
    }
  );

  logger.warn('Job moved to dead letter queue', {
    jobId: job.id,
    originalQueue: job.queueName,
    reason,
  });
}

// ============================================================================
// Worker Creation Helper
// ============================================================================

export type JobProcessor<T> = (job: Job<T>) => Promise<void>;

interface WorkerOptions<T> {
  queueName: QueueKey;
  concurrency?: number;
  processor: JobProcessor<T>;
}

/**
 * Create a worker for a queue
 */
export function createWorker<T>(options: WorkerOptions<T>): Worker<T> {
  const { queueName, concurrency = 1, processor } = options;
  initializeQueues();

  const worker = new Worker<T>(QUEUE_NAMES[queueName], processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job: Job<T>) => {
    logger.debug('Job completed', { jobId: job.id, name: job.name });
  });

  worker.on('failed', (job: Job<T> | undefined, error: Error) => {
    if (!job) return;

    logger.error('Job failed', {
      jobId: job.id,
      name: job.name,
      error: error.message,
      attemptsMade: job.attemptsMade,
    });

    // Move to DLQ once retries are exhausted
    if (job.attemptsMade >= (job.opts.attempts ?? 1)) {
      moveToDeadLetterQueue(job, error.message).catch((err: unknown) => {
        logger.error('Failed to move job to DLQ', toError(err));
      });
    }
  });

  worker.on('error', (error: Error) => {
    logger.error('Worker error', error);
  });

  return worker;
}

// ============================================================================
// Cleanup
// ============================================================================

/**
 * Close all queues and the Redis connection
 */
export async function closeQueues(): Promise<void> {
  logger.info('Closing all queues...');

  for (const [key, queue] of queues) {
    await queue.close();
    logger.debug(`Queue closed: ${QUEUE_NAMES[key]}`);
  }
  queues.clear();

  if (redisConnection) {
    await redisConnection.quit();
    redisConnection = null;
  }

  logger.info('All queues closed');
}

export { QUEUE_NAMES } from './definitions';
