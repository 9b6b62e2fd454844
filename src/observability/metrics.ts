import { MetricCounterName, MetricTimerName } from "./types";

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

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_crawled: this.counters.get("pages_crawled") ?? 0,
      rows_discovered: this.counters.get("rows_discovered") ?? 0,
      rows_ingested: this.counters.get("rows_ingested") ?? 0,
      rows_failed: this.counters.get("rows_failed") ?? 0,
      batches_completed: this.counters.get("batches_completed") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      download_ms: this.summarize("download_ms"),
      extract_ms: this.summarize("extract_ms"),
    };
  }

  printSummary(runId?: string): void {
    console.log(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: "info",
        msg: "metrics_summary",
        runId,
        counters: this.getCounters(),
        timers: this.getTimerSummaries(),
      }),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    const total = values.reduce((acc, value) => acc + value, 0);
    return {
      count: values.length,
      min: Math.min(...values),
      max: Math.max(...values),
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
