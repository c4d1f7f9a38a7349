import fs from "node:fs";
import { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { DownloadFn, pdfPathFor } from "../download/downloader";
import { PageReader } from "../extract/pageReader";
import { extractLinks } from "../links/linkExtractor";
import { MetricsRegistry, Reporter } from "../observability";
import { ArchiveOutcome, PaperOutcome, PaperResult, PipelineReport, SearchResult } from "../types";

export interface LinkArchiver {
  request(url: string): Promise<ArchiveOutcome>;
}

export interface PipelineDeps {
  config: Pick<AppConfig, "outputDir" | "archiveEnabled" | "linkHost">;
  download: DownloadFn;
  pageReader: PageReader;
  archiver: LinkArchiver;
  reporter: Reporter;
  metrics: MetricsRegistry;
}

async function scanPaper(result: SearchResult, deps: PipelineDeps): Promise<PaperOutcome> {
  const { config, reporter, metrics } = deps;
  const pdfPath = pdfPathFor(config.outputDir, result);

  let downloaded = false;
  if (fs.existsSync(pdfPath)) {
    metrics.incrementCounter("downloads_cached");
    reporter.report("debug", "download_cached", { paperId: result.id, path: pdfPath });
  } else {
    const stopTimer = metrics.startTimer("download_ms");
    const file = await deps.download(result, pdfPath);
    const durationMs = stopTimer();
    downloaded = true;
    metrics.incrementCounter("downloads_ok");
    reporter.report("info", "download_ok", { paperId: result.id, url: result.pdfUrl, bytes: file.bytes, durationMs });
  }

  const outcome: PaperOutcome = {
    id: result.id,
    title: result.title,
    pdfPath,
    downloaded,
    pageCount: 0,
    links: [],
    archives: [],
  };

  for await (const pageText of deps.pageReader.readPages(pdfPath)) {
    outcome.pageCount += 1;
    const links = extractLinks(pageText, config.linkHost);
    if (links.length === 0) {
      continue;
    }

    reporter.report("info", "paper_links_found", { paperId: result.id, title: result.title, page: outcome.pageCount });
    metrics.incrementCounter("links_found", links.length);

    for (const url of links) {
      outcome.links.push(url);
      if (config.archiveEnabled) {
        outcome.archives.push({ url, outcome: await deps.archiver.request(url) });
      } else {
        reporter.report("info", "link_found", { paperId: result.id, url, page: outcome.pageCount });
      }
    }
  }

  return outcome;
}

async function scanPaperSafely(result: SearchResult, deps: PipelineDeps): Promise<PaperResult> {
  try {
    return { ok: true, value: await scanPaper(result, deps) };
  } catch (error) {
    const message = errorMessage(error);
    deps.metrics.incrementCounter("papers_failed");
    deps.reporter.report("error", "paper_failed", { paperId: result.id, error: message });
    return { ok: false, fault: { id: result.id, error: message } };
  }
}

/**
 * Downloads each result into the output directory (reusing files already
 * there), scans every page for links on the configured host and archives or
 * reports them. A failing paper is recorded as a fault and the loop moves on.
 */
export async function scanPapers(results: readonly SearchResult[], deps: PipelineDeps): Promise<PipelineReport> {
  fs.mkdirSync(deps.config.outputDir, { recursive: true });

  const report: PipelineReport = { papers: [], faults: [] };
  for (const result of results) {
    const paperResult = await scanPaperSafely(result, deps);
    if (paperResult.ok) {
      report.papers.push(paperResult.value);
    } else {
      report.faults.push(paperResult.fault);
    }
  }
  return report;
}
