import type { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
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

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_listed: this.getCounter("pages_listed"),
      docs_listed: this.getCounter("docs_listed"),
      docs_already_completed: this.getCounter("docs_already_completed"),
      fetch_success: this.getCounter("fetch_success"),
      fetch_skipped: this.getCounter("fetch_skipped"),
      fetch_dry_run: this.getCounter("fetch_dry_run"),
      fetch_error: this.getCounter("fetch_error"),
      companions_fetched: this.getCounter("companions_fetched"),
      http_requests: this.getCounter("http_requests"),
      http_retries: this.getCounter("http_retries"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      document_fetch_ms: this.summarize("document_fetch_ms"),
    };
  }

  printSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
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
