import { toError } from '@/lib/error-logging';
import { logger } from '@/lib/logger';
import { incrementCounter, setGauge } from '@/lib/monitoring/metrics';
import type { GeoResolver } from './geo';
import {
  buildTelemetryRecord,
  type CaptureTarget,
  type RecordBuilderDeps,
  type RequestCapture,
} from './record-builder';
import type { TelemetryStore } from './store';
import type { NewTelemetryRecord } from './types';

export const TELEMETRY_METRICS = {
  dispatched: 'analytics.telemetry.dispatched',
  written: 'analytics.telemetry.written',
  failed: 'analytics.telemetry.failed',
  dropped: 'analytics.telemetry.dropped',
  inFlight: 'analytics.telemetry.in_flight',
} as const;

/**
 * Where finished records go: straight into the store, or onto a queue
 */
export interface TelemetrySink {
  write(record: NewTelemetryRecord): Promise<void>;
}

export class StoreSink implements TelemetrySink {
  constructor(private readonly store: TelemetryStore) {}

  async write(record: NewTelemetryRecord): Promise<void> {
    await this.store.append(record);
  }
}

export interface TelemetryDispatcherOptions {
  sink: TelemetrySink;
  geoResolver: GeoResolver;
  maxInFlight: number;
  identify?: RecordBuilderDeps['identify'];
}

export interface DispatcherStats {
  inFlight: number;
  /** Lifetime total */
  dropped: number;
  /** True while the backlog is full */
  dropping: boolean;
}

/**
 * Runs record building and persistence off the request path. At most
 * `maxInFlight` captures are processed at once; anything beyond that is
 * dropped and counted. No failure here reaches the caller.
 */
export class TelemetryDispatcher implements CaptureTarget {
  private readonly pending = new Set<Promise<void>>();
  private readonly deps: RecordBuilderDeps;
  private dropped = 0;
  private droppingSince: number | null = null;

  constructor(private readonly options: TelemetryDispatcherOptions) {
    this.deps = { geoResolver: options.geoResolver, identify: options.identify };
  }

  dispatch(capture: RequestCapture): boolean {
    if (this.pending.size >= this.options.maxInFlight) {
      this.dropped++;
      incrementCounter(TELEMETRY_METRICS.dropped);
      if (this.droppingSince === null) {
        this.droppingSince = Date.now();
        logger.warn('Telemetry backlog full; dropping records', {
          maxInFlight: this.options.maxInFlight,
          endpoint: capture.endpoint,
        });
      }
      return false;
    }

    incrementCounter(TELEMETRY_METRICS.dispatched);
    const task = this.deferred()
      .then(() => this.process(capture))
      .finally(() => {
        this.pending.delete(task);
        setGauge(TELEMETRY_METRICS.inFlight, this.pending.size);
        this.recovered();
      });
    this.pending.add(task);
    setGauge(TELEMETRY_METRICS.inFlight, this.pending.size);
    return true;
  }

  /**
   * Resolves once every capture accepted so far has been written or failed
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  stats(): DispatcherStats {
    return {
      inFlight: this.pending.size,
      dropped: this.dropped,
      dropping: this.droppingSince !== null,
    };
  }

  private recovered(): void {
    if (this.droppingSince === null || this.pending.size >= this.options.maxInFlight) return;
    logger.info('Telemetry backlog recovered', {
      droppedFor: Date.now() - this.droppingSince,
      droppedTotal: this.dropped,
    });
    this.droppingSince = null;
  }

  private deferred(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }

  private async process(capture: RequestCapture): Promise<void> {
    try {
      const record = await buildTelemetryRecord(capture, this.deps);
      await this.options.sink.write(record);
      incrementCounter(TELEMETRY_METRICS.written);
    } catch (error) {
      incrementCounter(TELEMETRY_METRICS.failed);
      logger.error('Failed to record request telemetry', toError(error), {
        endpoint: capture.endpoint,
        method: capture.method,
        statusCode: capture.statusCode,
      });
    }
  }
}
