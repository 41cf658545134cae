/**
 * Job Definitions
 *
 * Job types, retry configuration and queue routing for background
 * telemetry processing.
 */

import type { JobsOptions } from 'bullmq';
import type { NewTelemetryRecord } from '@/lib/analytics/types';

// ============================================================================
// Job Type Definitions
// ============================================================================

export type JobType = 'analytics.record';

export interface JobTypeNameMap {
  'analytics.record': AnalyticsRecordJobData;
}

// ============================================================================
// Job Data Interfaces
// ============================================================================

/**
 * A validated record on its way to the store. Dates do not survive the
 * queue's JSON encoding, so none are carried; `createdAt` is assigned on write.
 */
export interface AnalyticsRecordJobData {
  record: NewTelemetryRecord;
  /** Epoch ms at which the request completed */
  capturedAt: number;
}

// ============================================================================
// Job Configuration
// ============================================================================

export interface JobConfig {
  /** Job priority (lower number runs first in BullMQ) */
  priority: number;
  /** Number of retry attempts */
  attempts: number;
  /** Backoff strategy for retries */
  backoff: {
    type: 'exponential' | 'fixed';
    delay: number;
  };
  /** Remove job on completion */
  removeOnComplete: boolean | number;
  /** Remove job on failure */
  removeOnFail: boolean | number;
}

export const JOB_CONFIGS: Record<JobType, JobConfig> = {
  'analytics.record': {
    priority: 10,
    attempts: 3,
    backoff: {
      type: 'exponential',
      delay: 500,
    },
    removeOnComplete: true,
    removeOnFail: 1000, // keep recent failures for inspection
  },
};

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  ANALYTICS: 'api-analytics:records',
  DEAD_LETTER: 'api-analytics:dead-letter',
} as const;

export type QueueKey = keyof typeof QUEUE_NAMES;
export type QueueName = (typeof QUEUE_NAMES)[QueueKey];

export const QUEUE_KEYS: readonly QueueKey[] = ['ANALYTICS', 'DEAD_LETTER'];

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Get BullMQ job options from our job config
 */
export function getJobOptions(jobType: JobType): JobsOptions {
  const config = JOB_CONFIGS[jobType];
  return {
    priority: config.priority,
    attempts: config.attempts,
    backoff: config.backoff,
    removeOnComplete: config.removeOnComplete,
    removeOnFail: config.removeOnFail,
  };
}

export function getQueueKeyForJob(jobType: JobType): QueueKey {
  switch (jobType) {
    case 'analytics.record':
      return 'ANALYTICS';
  }
}
