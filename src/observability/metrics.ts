import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: {
        files_processed: this.getCounter("files_processed"),
        files_failed: this.getCounter("files_failed"),
        tables_located: this.getCounter("tables_located"),
        tables_passed: this.getCounter("tables_passed"),
        tables_exhausted: this.getCounter("tables_exhausted"),
        gateway_failures: this.getCounter("gateway_failures"),
        validation_failures: this.getCounter("validation_failures"),
        attempts_total: this.getCounter("attempts_total"),
      },
      timers: {
        gateway_call_ms: this.summarize("gateway_call_ms"),
        table_ms: this.summarize("table_ms"),
      },
    };
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
