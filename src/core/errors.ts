export class SearchError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly query: string,
  ) {
    super(`Search for "${query}" failed with HTTP ${statusCode}`);
    this.name = "SearchError";
  }
}

export class DownloadError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly url: string,
  ) {
    super(`HTTP ${statusCode} while downloading ${url}`);
    this.name = "DownloadError";
  }
}

export class ArchiveQueryError extends Error {
  constructor(
    public readonly url: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Archive availability query for ${url} failed: ${reason}`);
    this.name = "ArchiveQueryError";
    this.cause = cause;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
