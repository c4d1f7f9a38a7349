import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { AppConfig } from "../config";
import { DownloadError } from "../core/errors";
import { FetchFn, createFetch, fetchWithTimeout } from "../core/fetch";
import { SearchResult } from "../types";

export interface DownloadedFile {
  path: string;
  bytes: number;
  contentType?: string;
}

export type DownloadFn = (result: SearchResult, destPath: string) => Promise<DownloadedFile>;

interface DownloaderDeps {
  config: AppConfig;
  fetchFn?: FetchFn;
}

export function pdfPathFor(outputDir: string, result: SearchResult): string {
  return path.join(outputDir, `${result.id}.pdf`);
}

export function createPdfDownloader(deps: DownloaderDeps): DownloadFn {
  const { config } = deps;
  const fetchFn = deps.fetchFn ?? createFetch(config.ignoreHttpsErrors);

  return async (result, destPath) => {
    const response = await fetchWithTimeout(
      fetchFn,
      result.pdfUrl,
      {
        method: "GET",
        headers: {
          "user-agent": config.userAgent,
          accept: "application/pdf,*/*",
        },
        redirect: "follow",
      },
      config.downloadTimeoutMs,
    );

    if (!response.ok) {
      throw new DownloadError(response.status, result.pdfUrl);
    }
    if (!response.body) {
      throw new DownloadError(response.status, result.pdfUrl);
    }

    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    const tempPath = `${destPath}.part`;
    let bytes = 0;

    const writable = fs.createWriteStream(tempPath, { flags: "w" });
    const readable = Readable.fromWeb(response.body);
    readable.on("data", (chunk: Buffer | Uint8Array) => {
      bytes += chunk.length;
    });

    try {
      await pipeline(readable, writable);
      fs.renameSync(tempPath, destPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
      throw error;
    }

    return {
      path: destPath,
      bytes,
      contentType: response.headers.get("content-type") ?? undefined,
    };
  };
}
