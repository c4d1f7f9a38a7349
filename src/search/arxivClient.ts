import { AppConfig } from "../config";
import { SearchError } from "../core/errors";
import { FetchFn, createFetch, fetchWithTimeout } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { SearchResult } from "../types";
import { parseAtomFeed } from "./atomParser";

interface ArxivClientDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

export function normalizeQuery(query: string): string {
  const trimmed = query.trim();
  return trimmed.includes(":") ? trimmed : `all:${trimmed}`;
}

export function buildSearchUrl(baseUrl: string, query: string, limit: number): string {
  const params = new URLSearchParams({
    search_query: normalizeQuery(query),
    start: "0",
    max_results: String(limit),
    sortBy: "submittedDate",
    sortOrder: "descending",
  });
  return `${baseUrl}?${params.toString()}`;
}

export class ArxivClient {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchFn;

  constructor(deps: ArxivClientDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? createFetch(deps.config.ignoreHttpsErrors);
  }

  /** Newest submissions first, at most `limit` entries. */
  async search(query: string, limit: number): Promise<SearchResult[]> {
    const url = buildSearchUrl(this.config.searchBaseUrl, query, limit);
    const stopTimer = this.metrics.startTimer("search_ms");
    this.logger.info("search_start", { query, limit, url });

    const response = await fetchWithTimeout(
      this.fetchFn,
      url,
      {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept: "application/atom+xml",
        },
      },
      this.config.requestTimeoutMs,
    );

    if (!response.ok) {
      stopTimer();
      throw new SearchError(response.status, query);
    }

    const results = parseAtomFeed(await response.text());
    const durationMs = stopTimer();
    this.metrics.incrementCounter("papers_found", results.length);
    this.logger.info("search_complete", { query, resultCount: results.length, durationMs });
    return results;
  }
}
