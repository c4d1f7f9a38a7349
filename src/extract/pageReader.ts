export interface PageReader {
  /** Yields the plain text of each page, first page first. */
  readPages(filePath: string): AsyncIterable<string>;
}
