import { AppConfig } from "../config";
import { errorMessage, ProcessError } from "../core/errors";
import type { RequestLike } from "../browser";
import { PdfExtractor } from "../extract/pdfExtractor";
import { Logger, MetricsRegistry } from "../observability";
import { RecordSink } from "../sink/types";
import type { JudgmentRecord, RowDescriptor } from "../types";
import { formatUtcTimestamp, normalizeDate } from "./dates";
import { resolveFileName } from "./fileName";

export type IngestOutcome =
  | { status: "ingested"; row: RowDescriptor; record: JudgmentRecord }
  | { status: "failed"; row: RowDescriptor; error: ProcessError };

type IngestConfig = Pick<AppConfig, "downloadTimeoutMs" | "maxContentChars">;

interface JudgmentIngestorDeps {
  request: RequestLike;
  extractor: PdfExtractor;
  sink: RecordSink;
  config: IngestConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
}

interface DownloadedPdf {
  bytes: Buffer;
  fileName: string;
}

function emptyToNull(value: string): string | null {
  return value ? value : null;
}

export class JudgmentIngestor {
  private readonly request: RequestLike;
  private readonly extractor: PdfExtractor;
  private readonly sink: RecordSink;
  private readonly config: IngestConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => Date;

  constructor(deps: JudgmentIngestorDeps) {
    this.request = deps.request;
    this.extractor = deps.extractor;
    this.sink = deps.sink;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Downloads, extracts and stores one row. Never rejects: any failure comes back as a
   * `failed` outcome after being logged.
   */
  async processRow(row: RowDescriptor): Promise<IngestOutcome> {
    try {
      const record = await this.buildRecord(row);
      await this.sink.insert(record);
      this.metrics.incrementCounter("rows_ingested", 1);
      this.logger.info("row_ingested", { url: row.pdfUrl, pageIndex: row.pageIndex, fileName: record.fileName });
      return { status: "ingested", row, record };
    } catch (error) {
      const processError =
        error instanceof ProcessError
          ? error
          : new ProcessError(`Failed processing ${row.pdfUrl}: ${errorMessage(error)}`, row.pdfUrl, { cause: error });
      this.metrics.incrementCounter("rows_failed", 1);
      this.logger.error("row_failed", {
        url: row.pdfUrl,
        pageIndex: row.pageIndex,
        error: processError.message,
        cause: error instanceof Error ? error.name : undefined,
      });
      return { status: "failed", row, error: processError };
    }
  }

  private async buildRecord(row: RowDescriptor): Promise<JudgmentRecord> {
    const { bytes, fileName } = await this.download(row.pdfUrl);

    const stopTimer = this.metrics.startTimer("extract_ms");
    const { text: content, pageCount } = await this.extractor.extract(bytes, this.config.maxContentChars);
    stopTimer();

    return {
      caseNumber: emptyToNull(row.caseNumber),
      caseTitle: emptyToNull(row.title),
      judgmentDate: normalizeDate(row.deliveredOnRaw),
      fileName,
      content,
      pageCount,
      pageNumber: row.pageIndex + 1,
      extractedAt: formatUtcTimestamp(this.now()),
      downloadUrl: row.pdfUrl,
      pdfPreviewUrl: emptyToNull(row.pdfPreviewUrl),
    };
  }

  private async download(url: string): Promise<DownloadedPdf> {
    const stopTimer = this.metrics.startTimer("download_ms");
    const response = await this.request.get(url, { timeout: this.config.downloadTimeoutMs });
    if (!response.ok()) {
      throw new Error(`Failed to download PDF: HTTP ${response.status()}`);
    }

    const bytes = await response.body();
    this.logger.debug("pdf_downloaded", { url, bytes: bytes.length, durationMs: stopTimer() });
    return { bytes, fileName: resolveFileName(response.headers(), url) };
  }
}
