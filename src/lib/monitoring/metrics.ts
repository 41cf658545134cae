/**
 * In-process metrics: counters, gauges and bounded timer samples.
 * Recorders are synchronous and do no I/O.
 */

const MAX_TIMER_SAMPLES = 1000;

export interface TimerSummary {
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  max: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  timers: Record<string, TimerSummary>;
}

class InMemoryMetricsStore {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private timers = new Map<string, number[]>();

  incrementCounter(name: string, value: number): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  setGauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordTimer(name: string, durationMs: number): void {
    const values = this.timers.get(name) ?? [];
    values.push(durationMs);
    if (values.length > MAX_TIMER_SAMPLES) {
      values.shift();
    }
    this.timers.set(name, values);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  getGauge(name: string): number | undefined {
    return this.gauges.get(name);
  }

  getTimerValues(name: string): number[] {
    return this.timers.get(name) ?? [];
  }

  snapshot(): MetricsSnapshot {
    const timers: Record<string, TimerSummary> = {};
    for (const [name, values] of this.timers) {
      timers[name] = summarize(values);
    }
    return {
      timestamp: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      timers,
    };
  }

  clear(): void {
    this.counters.clear();
    this.gauges.clear();
    this.timers.clear();
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}

export function summarize(values: number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, avg: 0, p50: 0, p95: 0, p99: 0, max: 0 };
  }
  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, v) => sum + v, 0);
  return {
    count: sorted.length,
    avg: total / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    max: sorted[sorted.length - 1],
  };
}

const memoryStore = new InMemoryMetricsStore();

export function incrementCounter(name: string, value = 1): void {
  memoryStore.incrementCounter(name, value);
}

export function setGauge(name: string, value: number): void {
  memoryStore.setGauge(name, value);
}

export function recordTimer(name: string, durationMs: number): void {
  memoryStore.recordTimer(name, durationMs);
}

export function getCounter(name: string): number {
  return memoryStore.getCounter(name);
}

export function getGauge(name: string): number | undefined {
  return memoryStore.getGauge(name);
}

export function getTimerSummary(name: string): TimerSummary {
  return summarize(memoryStore.getTimerValues(name));
}

export function getMetricsSnapshot(): MetricsSnapshot {
  return memoryStore.snapshot();
}

export function resetMetrics(): void {
  memoryStore.clear();
}
