export interface SearchResult {
  id: string;
  entryId: string;
  title: string;
  pdfUrl: string;
  published?: string;
}

export type ArchiveOutcome =
  | { kind: "already_archived"; snapshotUrl: string }
  | { kind: "newly_archived" }
  | { kind: "failed"; statusCode: number };

export interface ArchivedLink {
  url: string;
  outcome: ArchiveOutcome;
}

export interface PaperOutcome {
  id: string;
  title: string;
  pdfPath: string;
  downloaded: boolean;
  pageCount: number;
  links: string[];
  archives: ArchivedLink[];
}

export interface PaperFault {
  id: string;
  error: string;
}

export type PaperResult = { ok: true; value: PaperOutcome } | { ok: false; fault: PaperFault };

export interface PipelineReport {
  papers: PaperOutcome[];
  faults: PaperFault[];
}
