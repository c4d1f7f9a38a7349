import { describe, it, expect } from "@jest/globals";
import { createRunId, Logger, LogLevel, MetricsRegistry } from "../src/observability";

describe("Logger", () => {
  it("writes one JSON line per entry with the run context", () => {
    const written: Array<{ level: LogLevel; line: string }> = [];
    const logger = new Logger({ component: "cli", runId: "run_1" }, (level, line) => written.push({ level, line }));

    logger.child("pipeline").report("warn", "archive_failed", { url: "https://github.com/a/b", statusCode: 502 });
    logger.error("command_failed");

    expect(written.map((entry) => entry.level)).toEqual(["warn", "error"]);
    const first: unknown = JSON.parse(written[0].line);
    expect(first).toMatchObject({
      level: "warn",
      msg: "archive_failed",
      component: "pipeline",
      runId: "run_1",
      url: "https://github.com/a/b",
      statusCode: 502,
    });
    expect(JSON.parse(written[1].line)).toMatchObject({ level: "error", msg: "command_failed", component: "cli" });
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and timer samples", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("links_found", 3);
    metrics.incrementCounter("links_found");
    metrics.startTimer("archive_ms")();

    expect(metrics.counter("links_found")).toBe(4);
    expect(metrics.counter("archives_failed")).toBe(0);
    expect(metrics.timer("archive_ms").count).toBe(1);
    expect(metrics.timer("search_ms")).toEqual({ count: 0, totalMs: 0, maxMs: 0 });
  });
});

describe("MetricsRegistry.printSummary", () => {
  it("logs counters and timers as one metrics_summary line", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run_1" }, (_level, line) => lines.push(line));
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("archives_submitted", 2);

    metrics.printSummary(logger);

    expect(lines).toHaveLength(1);
    const summary: unknown = JSON.parse(lines[0]);
    expect(summary).toMatchObject({
      msg: "metrics_summary",
      counters: { archives_submitted: 2, papers_found: 0 },
      timers: { download_ms: { count: 0, totalMs: 0, maxMs: 0 } },
    });
  });
});

describe("createRunId", () => {
  it("combines the timestamp with a random suffix", () => {
    expect(createRunId(new Date("2024-05-06T07:08:09.010Z"), () => 0.5)).toBe("scan_2024-05-06T07-08-09-010Z_i00000");
  });
});
