import { AppConfig } from "../config";
import { ArchiveQueryError, errorMessage } from "../core/errors";
import { FetchFn, createFetch, fetchWithTimeout } from "../core/fetch";
import { MetricsRegistry, Reporter } from "../observability";
import { ArchiveOutcome } from "../types";

interface ArchiveRequesterDeps {
  config: Pick<AppConfig, "availabilityUrl" | "saveUrl" | "userAgent" | "ignoreHttpsErrors" | "requestTimeoutMs">;
  reporter: Reporter;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads `archived_snapshots.closest.url` from an availability response body. */
export function closestSnapshotUrl(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const snapshots = body.archived_snapshots;
  if (!isRecord(snapshots)) {
    return undefined;
  }
  const closest = snapshots.closest;
  if (!isRecord(closest)) {
    return undefined;
  }
  return typeof closest.url === "string" ? closest.url : undefined;
}

export class ArchiveRequester {
  private readonly config: ArchiveRequesterDeps["config"];
  private readonly reporter: Reporter;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchFn;

  constructor(deps: ArchiveRequesterDeps) {
    this.config = deps.config;
    this.reporter = deps.reporter;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? createFetch(deps.config.ignoreHttpsErrors);
  }

  /**
   * Checks the availability endpoint and submits a save request only when no
   * snapshot exists. A non-200 save status is returned as a `failed` outcome;
   * availability faults throw {@link ArchiveQueryError}.
   */
  async request(url: string): Promise<ArchiveOutcome> {
    const stopTimer = this.metrics.startTimer("archive_ms");
    try {
      const snapshotUrl = await this.findSnapshot(url);
      if (snapshotUrl) {
        this.metrics.incrementCounter("archives_existing");
        this.reporter.report("info", "archive_existing", { url, snapshotUrl });
        return { kind: "already_archived", snapshotUrl };
      }

      const statusCode = await this.submitSave(url);
      if (statusCode === 200) {
        this.metrics.incrementCounter("archives_submitted");
        this.reporter.report("info", "archive_submitted", { url });
        return { kind: "newly_archived" };
      }

      this.metrics.incrementCounter("archives_failed");
      this.reporter.report("warn", "archive_failed", { url, statusCode });
      return { kind: "failed", statusCode };
    } finally {
      stopTimer();
    }
  }

  private async findSnapshot(url: string): Promise<string | undefined> {
    const queryUrl = `${this.config.availabilityUrl}?${new URLSearchParams({ url }).toString()}`;

    let body: unknown;
    try {
      const response = await fetchWithTimeout(
        this.fetchFn,
        queryUrl,
        {
          method: "GET",
          headers: {
            "user-agent": this.config.userAgent,
            accept: "application/json",
          },
        },
        this.config.requestTimeoutMs,
      );
      if (!response.ok) {
        throw new ArchiveQueryError(url, `HTTP ${response.status}`);
      }
      body = JSON.parse(await response.text());
    } catch (error) {
      if (error instanceof ArchiveQueryError) {
        throw error;
      }
      throw new ArchiveQueryError(url, errorMessage(error), error);
    }

    return closestSnapshotUrl(body);
  }

  private async submitSave(url: string): Promise<number> {
    const saveUrl = `${this.config.saveUrl.replace(/\/+$/, "")}/${url}`;
    const response = await fetchWithTimeout(
      this.fetchFn,
      saveUrl,
      {
        method: "POST",
        headers: {
          "user-agent": this.config.userAgent,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ url, capture_all: "on" }).toString(),
      },
      this.config.requestTimeoutMs,
    );
    await response.arrayBuffer();
    return response.status;
  }
}
