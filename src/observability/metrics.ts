import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  maxMs: number;
}

const COUNTERS: readonly MetricCounterName[] = [
  "papers_found",
  "downloads_ok",
  "downloads_cached",
  "papers_failed",
  "links_found",
  "archives_existing",
  "archives_submitted",
  "archives_failed",
];

const TIMERS: readonly MetricTimerName[] = ["search_ms", "download_ms", "archive_ms"];

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, TimerSummary>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.counter(name) + value);
  }

  counter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /** Returns a stop function that records the elapsed time and returns it. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const current = this.timer(name);
      this.timers.set(name, {
        count: current.count + 1,
        totalMs: current.totalMs + durationMs,
        maxMs: Math.max(current.maxMs, durationMs),
      });
      return durationMs;
    };
  }

  timer(name: MetricTimerName): TimerSummary {
    return this.timers.get(name) ?? { count: 0, totalMs: 0, maxMs: 0 };
  }

  printSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: Object.fromEntries(COUNTERS.map((name) => [name, this.counter(name)])),
      timers: Object.fromEntries(TIMERS.map((name) => [name, this.timer(name)])),
    });
  }
}
