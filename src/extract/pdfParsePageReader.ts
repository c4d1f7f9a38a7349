import fs from "node:fs";
import { PDFParse } from "pdf-parse";
import { PageReader } from "./pageReader";

interface ParserLike {
  getText(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  destroy(): Promise<void>;
}

interface PdfParsePageReaderDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export class PdfParsePageReader implements PageReader {
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: PdfParsePageReaderDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps?.readFile ?? ((filePath) => fs.promises.readFile(filePath));
  }

  async *readPages(filePath: string): AsyncGenerator<string> {
    const pdfBuffer = await this.readFile(filePath);
    const parser = this.parserFactory(pdfBuffer);

    let textResult;
    try {
      textResult = await parser.getText();
    } finally {
      await parser.destroy().catch(() => undefined);
    }

    const pages = [...textResult.pages].sort((a, b) => a.num - b.num);
    for (const page of pages) {
      yield page.text;
    }
  }
}
