/**
 * Performance Logging Utilities
 *
 * - Sub-millisecond timers backed by the monotonic clock
 * - Slow operation warnings per threshold
 * - Durations recorded into the in-process metrics store
 */

import { logger, type LogContext } from '@/lib/logger';
import { recordTimer } from '@/lib/monitoring/metrics';

const SLOW_OPERATION_THRESHOLD = 1000;
const SLOW_DB_QUERY_THRESHOLD = 500;
const SLOW_REPORT_THRESHOLD = 2000;

export const THRESHOLDS = {
  SLOW_OPERATION: SLOW_OPERATION_THRESHOLD,
  SLOW_DB_QUERY: SLOW_DB_QUERY_THRESHOLD,
  SLOW_REPORT: SLOW_REPORT_THRESHOLD,
} as const;

export interface PerformanceMetrics {
  operation: string;
  duration: number;
  threshold: number;
  isSlow: boolean;
  timestamp: string;
  context?: LogContext;
}

export class PerformanceTimer {
  private readonly startTime: number;

  constructor(
    private readonly operation: string,
    private readonly context?: LogContext,
    private readonly threshold: number = SLOW_OPERATION_THRESHOLD
  ) {
    this.startTime = performance.now();
  }

  /**
   * Stop the timer, record the duration and log slow operations
   */
  end(additionalContext?: LogContext): PerformanceMetrics {
    const duration = this.elapsed();
    const isSlow = duration > this.threshold;
    const metrics: PerformanceMetrics = {
      operation: this.operation,
      duration,
      threshold: this.threshold,
      isSlow,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...additionalContext },
    };

    recordTimer(this.operation, duration);

    const context = {
      ...metrics.context,
      operation: this.operation,
      durationMs: Math.round(duration * 100) / 100,
      threshold: this.threshold,
    };

    if (isSlow) {
      logger.warn(`Slow operation detected: ${this.operation}`, context);
    } else {
      logger.debug(`Operation completed: ${this.operation}`, context);
    }

    return metrics;
  }

  elapsed(): number {
    return performance.now() - this.startTime;
  }
}

export function startTimer(
  operation: string,
  context?: LogContext,
  threshold?: number
): PerformanceTimer {
  return new PerformanceTimer(operation, context, threshold);
}

/**
 * Time an async operation; the timer is closed on success and failure alike
 */
export async function trackOperation<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext,
  threshold?: number
): Promise<T> {
  const timer = new PerformanceTimer(operation, context, threshold);
  try {
    const result = await fn();
    timer.end();
    return result;
  } catch (error) {
    timer.end({ error: true });
    throw error;
  }
}

export function trackDbQuery<T>(
  queryName: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  return trackOperation(`db:${queryName}`, fn, context, SLOW_DB_QUERY_THRESHOLD);
}
