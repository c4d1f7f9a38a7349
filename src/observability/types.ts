export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  paperId?: string;
  url?: string;
  title?: string;
  [key: string]: unknown;
}

export interface Reporter {
  report(level: LogLevel, msg: string, fields?: LogFields): void;
}

export type MetricCounterName =
  | "papers_found"
  | "downloads_ok"
  | "downloads_cached"
  | "papers_failed"
  | "links_found"
  | "archives_existing"
  | "archives_submitted"
  | "archives_failed";

export type MetricTimerName = "search_ms" | "download_ms" | "archive_ms";
