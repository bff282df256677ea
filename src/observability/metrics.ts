import type { MetricCounterName, MetricTimerName } from "./types";

export interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  recordDuration(name: MetricTimerName, durationMs: number): void {
    const values = this.timers.get(name) ?? [];
    values.push(durationMs);
    this.timers.set(name, values);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      this.recordDuration(name, durationMs);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      chunks_dispatched: this.counters.get("chunks_dispatched") ?? 0,
      chunks_ok: this.counters.get("chunks_ok") ?? 0,
      chunks_failed: this.counters.get("chunks_failed") ?? 0,
      chunks_skipped: this.counters.get("chunks_skipped") ?? 0,
      chunks_unreadable: this.counters.get("chunks_unreadable") ?? 0,
      features_returned: this.counters.get("features_returned") ?? 0,
      probe_requests: this.counters.get("probe_requests") ?? 0,
      catalog_requests: this.counters.get("catalog_requests") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      probe_ms: this.summarize("probe_ms"),
      chunk_request_ms: this.summarize("chunk_request_ms"),
      merge_ms: this.summarize("merge_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
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
