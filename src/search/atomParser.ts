import { load } from "cheerio";
import { SearchResult } from "../types";

function sanitizeTitle(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function identifierFromEntryId(entryId: string): string {
  const segments = entryId.replace(/\/+$/, "").split("/");
  return segments[segments.length - 1] ?? entryId;
}

function fallbackPdfUrl(entryId: string): string {
  return entryId.replace("/abs/", "/pdf/");
}

export function parseAtomFeed(xml: string): SearchResult[] {
  const $ = load(xml, { xml: true });
  const results: SearchResult[] = [];

  $("feed > entry").each((_, element) => {
    const entry = $(element);
    const entryId = entry.children("id").first().text().trim();
    if (!entryId) {
      return;
    }

    const pdfHref = entry.children("link[title='pdf']").attr("href");
    const published = entry.children("published").first().text().trim();
    results.push({
      id: identifierFromEntryId(entryId),
      entryId,
      title: sanitizeTitle(entry.children("title").first().text()),
      pdfUrl: pdfHref ?? fallbackPdfUrl(entryId),
      published: published || undefined,
    });
  });

  return results;
}
