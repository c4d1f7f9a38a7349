import { AppConfig } from "../config";
import { ArchiveRequester } from "../archive/archiveRequester";
import { createPdfDownloader, DownloadFn } from "../download/downloader";
import { PageReader } from "../extract/pageReader";
import { PdfParsePageReader } from "../extract/pdfParsePageReader";
import { Logger, MetricsRegistry } from "../observability";
import { scanPapers } from "../pipeline/paperPipeline";
import { ArxivClient } from "../search/arxivClient";
import { ArchiveOutcome, PipelineReport, SearchResult } from "../types";
import { FetchFn } from "./fetch";

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  pageReader?: PageReader;
  download?: DownloadFn;
}

function createArchiver(ctx: CommandContext): ArchiveRequester {
  return new ArchiveRequester({
    config: ctx.config,
    reporter: ctx.logger,
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
  });
}

export async function runSearch(ctx: CommandContext): Promise<SearchResult[]> {
  const client = new ArxivClient({ config: ctx.config, logger: ctx.logger, metrics: ctx.metrics, fetchFn: ctx.fetchFn });
  const results = await client.search(ctx.config.query, ctx.config.limit);
  for (const result of results) {
    ctx.logger.info("search_result", { paperId: result.id, entryId: result.entryId, title: result.title });
  }
  return results;
}

export async function runPipeline(ctx: CommandContext): Promise<PipelineReport> {
  ctx.logger.info("pipeline_start", {
    query: ctx.config.query,
    limit: ctx.config.limit,
    archiveEnabled: ctx.config.archiveEnabled,
    outputDir: ctx.config.outputDir,
  });

  const results = await runSearch(ctx);
  const report = await scanPapers(results, {
    config: ctx.config,
    download: ctx.download ?? createPdfDownloader({ config: ctx.config, fetchFn: ctx.fetchFn }),
    pageReader: ctx.pageReader ?? new PdfParsePageReader(),
    archiver: createArchiver(ctx),
    reporter: ctx.logger,
    metrics: ctx.metrics,
  });

  ctx.logger.info("run_complete", {
    papers: report.papers.length,
    faults: report.faults.length,
    links: report.papers.reduce((acc, paper) => acc + paper.links.length, 0),
  });
  return report;
}

export async function runArchive(ctx: CommandContext, url: string): Promise<ArchiveOutcome> {
  ctx.logger.info("archive_start", { url });
  const outcome = await createArchiver(ctx).request(url);
  ctx.logger.info("archive_complete", { url, outcome: outcome.kind });
  return outcome;
}
