import { PDFParse } from "pdf-parse";
import { PdfParseError } from "../core/errors";

interface ParserLike {
  getText(params?: { pageJoiner?: string }): Promise<{ text?: string; total: number }>;
  destroy(): Promise<void>;
}

export type PdfParserFactory = (data: Buffer) => ParserLike;

export interface ExtractedPdf {
  text: string;
  pageCount: number;
}

export interface PdfExtractor {
  /** Text and page count from a single parse. */
  extract(bytes: Buffer, maxChars?: number): Promise<ExtractedPdf>;
  extractText(bytes: Buffer, maxChars?: number): Promise<string>;
  countPages(bytes: Buffer): Promise<number>;
}

/** Hard cut at `maxChars`; text at or under the limit is returned as is. */
export function truncateText(text: string, maxChars?: number): string {
  if (maxChars === undefined || text.length <= maxChars) {
    return text;
  }
  return text.slice(0, maxChars);
}

export class PdfParseExtractor implements PdfExtractor {
  private readonly parserFactory: PdfParserFactory;

  constructor(parserFactory?: PdfParserFactory) {
    this.parserFactory = parserFactory ?? ((data) => new PDFParse({ data }));
  }

  async extract(bytes: Buffer, maxChars?: number): Promise<ExtractedPdf> {
    const parsed = await this.parse(bytes);
    return { text: truncateText(parsed.text ?? "", maxChars), pageCount: parsed.total };
  }

  async extractText(bytes: Buffer, maxChars?: number): Promise<string> {
    return (await this.extract(bytes, maxChars)).text;
  }

  async countPages(bytes: Buffer): Promise<number> {
    return (await this.extract(bytes)).pageCount;
  }

  private async parse(bytes: Buffer): Promise<{ text?: string; total: number }> {
    if (bytes.length === 0) {
      throw new PdfParseError("PDF document is empty");
    }

    let parser: ParserLike;
    try {
      parser = this.parserFactory(bytes);
    } catch (error) {
      throw new PdfParseError("PDF document could not be opened", { cause: error });
    }

    try {
      // An empty joiner keeps pdf-parse from inserting "-- N of M --" between pages.
      return await parser.getText({ pageJoiner: "" });
    } catch (error) {
      throw new PdfParseError(`PDF document could not be parsed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    } finally {
      await parser.destroy().catch(() => undefined);
    }
  }
}
