import { describe, expect, it } from "vitest";
import { ProcessError } from "../core/errors";
import type { PdfExtractor } from "../extract/pdfExtractor";
import { MetricsRegistry, createSilentLogger } from "../observability";
import type { RecordSink } from "../sink/types";
import { FakeRequest, fakeResponse } from "../testing/fakeBrowser";
import type { JudgmentRecord, RowDescriptor } from "../types";
import { JudgmentIngestor } from "./judgmentIngestor";

class RecordingSink implements RecordSink {
  readonly inserted: JudgmentRecord[] = [];
  failFor = new Set<string>();

  async insert(record: JudgmentRecord): Promise<void> {
    if (this.failFor.has(record.downloadUrl)) {
      this.failFor.delete(record.downloadUrl);
      throw new Error("duplicate key value violates unique constraint");
    }
    this.inserted.push(record);
  }
}

class StubExtractor implements PdfExtractor {
  calls = 0;

  async extract(bytes: Buffer, maxChars?: number) {
    this.calls += 1;
    return { text: `text of ${bytes.length} bytes`.slice(0, maxChars), pageCount: 3 };
  }

  async extractText(bytes: Buffer, maxChars?: number): Promise<string> {
    return (await this.extract(bytes, maxChars)).text;
  }

  async countPages(bytes: Buffer): Promise<number> {
    return (await this.extract(bytes)).pageCount;
  }
}

function row(overrides: Partial<RowDescriptor> = {}): RowDescriptor {
  return {
    title: "Republic v. Mensah",
    caseNumber: "CR/12/2024",
    deliveredOnRaw: "22/08/2025",
    pdfUrl: "https://portal.example.org/files/cr-12-2024",
    pdfPreviewUrl: "",
    pageIndex: 1,
    ...overrides,
  };
}

function createIngestor(request: FakeRequest, sink: RecordingSink, maxContentChars?: number) {
  const metrics = new MetricsRegistry();
  const extractor = new StubExtractor();
  const ingestor = new JudgmentIngestor({
    request,
    extractor,
    sink,
    config: { downloadTimeoutMs: 45_000, maxContentChars },
    logger: createSilentLogger(),
    metrics,
    now: () => new Date(Date.UTC(2025, 7, 23, 10, 15, 0)),
  });
  return { ingestor, metrics, extractor };
}

describe("JudgmentIngestor", () => {
  it("downloads, extracts and stores a row", async () => {
    const request = new FakeRequest(() =>
      fakeResponse({ headers: { "content-disposition": 'attachment; filename="CR-12-2024.pdf"' } }),
    );
    const sink = new RecordingSink();
    const { ingestor, metrics, extractor } = createIngestor(request, sink);

    const outcome = await ingestor.processRow(row());

    expect(outcome.status).toBe("ingested");
    expect(extractor.calls).toBe(1);
    expect(request.requested).toEqual([{ url: "https://portal.example.org/files/cr-12-2024", timeout: 45_000 }]);
    expect(sink.inserted).toEqual([
      {
        caseNumber: "CR/12/2024",
        caseTitle: "Republic v. Mensah",
        judgmentDate: "2025-08-22 00:00:00",
        fileName: "CR-12-2024.pdf",
        content: "text of 13 bytes",
        pageCount: 3,
        pageNumber: 2,
        extractedAt: "2025-08-23 10:15:00",
        downloadUrl: "https://portal.example.org/files/cr-12-2024",
        pdfPreviewUrl: null,
      },
    ]);
    expect(metrics.getCounters().rows_ingested).toBe(1);
  });

  it("maps blank cells and unknown dates to null and truncates content", async () => {
    const sink = new RecordingSink();
    const { ingestor } = createIngestor(new FakeRequest(), sink, 4);

    await ingestor.processRow(
      row({ caseNumber: "", title: "", deliveredOnRaw: "sometime", pdfPreviewUrl: "https://portal.example.org/j/1" }),
    );

    expect(sink.inserted[0]).toMatchObject({
      caseNumber: null,
      caseTitle: null,
      judgmentDate: null,
      fileName: "cr-12-2024.pdf",
      content: "text",
      pdfPreviewUrl: "https://portal.example.org/j/1",
    });
  });

  it("reports a non-success download as a failed outcome", async () => {
    const sink = new RecordingSink();
    const { ingestor, metrics } = createIngestor(new FakeRequest(() => fakeResponse({ status: 404 })), sink);

    const outcome = await ingestor.processRow(row());

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toBeInstanceOf(ProcessError);
      expect(outcome.error.pdfUrl).toBe("https://portal.example.org/files/cr-12-2024");
      expect(outcome.error.message).toBe(
        "Failed processing https://portal.example.org/files/cr-12-2024: Failed to download PDF: HTTP 404",
      );
    }
    expect(sink.inserted).toEqual([]);
    expect(metrics.getCounters().rows_failed).toBe(1);
  });

  it("keeps sibling rows going when one insert fails", async () => {
    const sink = new RecordingSink();
    sink.failFor.add("https://portal.example.org/files/a");
    const { ingestor, metrics } = createIngestor(new FakeRequest(), sink);

    const outcomes = await Promise.all([
      ingestor.processRow(row({ pdfUrl: "https://portal.example.org/files/a" })),
      ingestor.processRow(row({ pdfUrl: "https://portal.example.org/files/b" })),
    ]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["failed", "ingested"]);
    expect(sink.inserted.map((record) => record.downloadUrl)).toEqual(["https://portal.example.org/files/b"]);
    expect(metrics.getCounters()).toMatchObject({ rows_ingested: 1, rows_failed: 1 });
  });
});
