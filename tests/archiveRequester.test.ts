import { describe, it, expect, jest } from "@jest/globals";
import { Response } from "undici";
import { ArchiveRequester, closestSnapshotUrl } from "../src/archive/archiveRequester";
import { DEFAULT_CONFIG } from "../src/config";
import { ArchiveQueryError } from "../src/core/errors";
import { FetchFn } from "../src/core/fetch";
import { MetricsRegistry } from "../src/observability";
import { RecordingReporter } from "./helpers";

const TARGET = "https://github.com/foo/bar";
const AVAILABILITY_QUERY = "https://archive.org/wayback/available?url=https%3A%2F%2Fgithub.com%2Ffoo%2Fbar";
const SNAPSHOT = "http://web.archive.org/web/20240101000000/https://github.com/foo/bar";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function setup(responses: Array<() => Promise<Response>>) {
  const fetchFn = jest.fn<FetchFn>();
  for (const next of responses) {
    fetchFn.mockImplementationOnce(next);
  }
  const reporter = new RecordingReporter();
  const metrics = new MetricsRegistry();
  const requester = new ArchiveRequester({ config: DEFAULT_CONFIG, reporter, metrics, fetchFn });
  return { fetchFn, reporter, metrics, requester };
}

describe("ArchiveRequester", () => {
  it("reports an existing snapshot with a single read call", async () => {
    const { fetchFn, reporter, metrics, requester } = setup([
      async () => jsonResponse({ url: TARGET, archived_snapshots: { closest: { available: true, url: SNAPSHOT } } }),
    ]);

    await expect(requester.request(TARGET)).resolves.toEqual({ kind: "already_archived", snapshotUrl: SNAPSHOT });

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(AVAILABILITY_QUERY);
    expect(fetchFn.mock.calls[0][1]?.method).toBe("GET");
    expect(reporter.lines).toEqual([{ level: "info", msg: "archive_existing", fields: { url: TARGET, snapshotUrl: SNAPSHOT } }]);
    expect(metrics.counter("archives_existing")).toBe(1);
  });

  it("submits a save request when no snapshot exists", async () => {
    const { fetchFn, reporter, requester } = setup([
      async () => jsonResponse({ url: TARGET, archived_snapshots: {} }),
      async () => new Response("saved", { status: 200 }),
    ]);

    await expect(requester.request(TARGET)).resolves.toEqual({ kind: "newly_archived" });

    expect(fetchFn).toHaveBeenCalledTimes(2);
    const [saveUrl, saveInit] = fetchFn.mock.calls[1];
    expect(saveUrl).toBe("https://web.archive.org/save/https://github.com/foo/bar");
    expect(saveInit?.method).toBe("POST");
    expect(saveInit?.body).toBe("url=https%3A%2F%2Fgithub.com%2Ffoo%2Fbar&capture_all=on");
    expect(reporter.messages()).toEqual(["archive_submitted"]);
  });

  it("returns the status code of a failed save without throwing", async () => {
    const { fetchFn, reporter, metrics, requester } = setup([
      async () => jsonResponse({ archived_snapshots: {} }),
      async () => new Response("error", { status: 500 }),
    ]);

    await expect(requester.request(TARGET)).resolves.toEqual({ kind: "failed", statusCode: 500 });

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(reporter.lines).toEqual([{ level: "warn", msg: "archive_failed", fields: { url: TARGET, statusCode: 500 } }]);
    expect(metrics.counter("archives_failed")).toBe(1);
  });

  it("throws ArchiveQueryError on a malformed availability body", async () => {
    const { fetchFn, requester } = setup([async () => new Response("<html>busy</html>", { status: 200 })]);

    await expect(requester.request(TARGET)).rejects.toBeInstanceOf(ArchiveQueryError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("throws ArchiveQueryError when the availability endpoint is unreachable", async () => {
    const { requester } = setup([
      async () => {
        throw new TypeError("fetch failed");
      },
    ]);

    await expect(requester.request(TARGET)).rejects.toThrow(
      `Archive availability query for ${TARGET} failed: fetch failed`,
    );
  });

  it("throws ArchiveQueryError on a non-2xx availability status", async () => {
    const { requester } = setup([async () => new Response("unavailable", { status: 503 })]);

    await expect(requester.request(TARGET)).rejects.toThrow(
      `Archive availability query for ${TARGET} failed: HTTP 503`,
    );
  });
});

describe("closestSnapshotUrl", () => {
  it("reads the nested snapshot url", () => {
    expect(closestSnapshotUrl({ archived_snapshots: { closest: { url: SNAPSHOT } } })).toBe(SNAPSHOT);
  });

  it("ignores missing or mistyped fields", () => {
    expect(closestSnapshotUrl(null)).toBeUndefined();
    expect(closestSnapshotUrl({ archived_snapshots: [] })).toBeUndefined();
    expect(closestSnapshotUrl({ archived_snapshots: { closest: { url: 42 } } })).toBeUndefined();
  });
});
