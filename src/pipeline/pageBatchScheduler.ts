import { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { sleep as defaultSleep, SleepFn } from "../core/sleep";
import { TaskGroup } from "../core/taskGroup";
import type { IngestOutcome } from "../ingest";
import { Logger, MetricsRegistry } from "../observability";
import { RunStore } from "../store/types";
import type { RowDescriptor } from "../types";

export interface Authenticator {
  login(): Promise<void>;
}

export interface ListingSource {
  goToPage(pageIndex: number): Promise<void>;
  listRows(): Promise<RowDescriptor[]>;
  hasNextPage(): Promise<boolean>;
}

export interface RowProcessor {
  processRow(row: RowDescriptor): Promise<IngestOutcome>;
}

export interface PageSummary {
  pageIndex: number;
  rows: number;
  batchSizes: number[];
}

export interface RunSummary {
  pages: PageSummary[];
  ingested: number;
  failed: number;
}

type SchedulerConfig = Pick<AppConfig, "startPage" | "endPage" | "batchSize" | "pageDelayMs">;

interface PageBatchSchedulerDeps {
  runId: string;
  auth: Authenticator;
  walker: ListingSource;
  ingestor: RowProcessor;
  store: RunStore;
  config: SchedulerConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: SleepFn;
}

/**
 * Walks listing pages in order and ingests each page's rows in batches of at most
 * `batchSize` concurrent tasks, pausing `pageDelayMs` between full batches.
 * With `endPage` unset the walk follows the pager's "next" link until it disappears.
 */
export class PageBatchScheduler {
  private readonly deps: PageBatchSchedulerDeps;
  private readonly sleep: SleepFn;

  constructor(deps: PageBatchSchedulerDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(): Promise<RunSummary> {
    const { auth, walker, config, logger } = this.deps;

    await auth.login();

    const startIndex = Math.max(config.startPage - 1, 0);
    const endIndex = config.endPage !== undefined ? config.endPage - 1 : undefined;
    const summary: RunSummary = { pages: [], ingested: 0, failed: 0 };
    logger.info("crawl_start", { startIndex, endIndex: endIndex ?? "unbounded", batchSize: config.batchSize });

    let pageIndex = startIndex;
    while (endIndex === undefined || pageIndex <= endIndex) {
      logger.info("page_start", { pageIndex, pageNumber: pageIndex + 1 });
      await walker.goToPage(pageIndex);
      const rows = await walker.listRows();

      const page = await this.processPage(pageIndex, rows, summary);
      summary.pages.push(page);
      logger.info("page_complete", { ...page });

      if (endIndex === undefined && !(await walker.hasNextPage())) {
        logger.info("crawl_no_next_page", { pageIndex });
        break;
      }
      pageIndex += 1;
    }

    logger.info("crawl_finished", {
      pagesVisited: summary.pages.length,
      ingested: summary.ingested,
      failed: summary.failed,
    });
    return summary;
  }

  private async processPage(pageIndex: number, rows: RowDescriptor[], summary: RunSummary): Promise<PageSummary> {
    const { config } = this.deps;
    const group = new TaskGroup<IngestOutcome>();
    const batchSizes: number[] = [];

    for (const row of rows) {
      const scheduled: RowDescriptor = { ...row, pageIndex };
      group.add(() => this.ingest(scheduled));

      if (group.size >= config.batchSize) {
        await this.completeBatch(group, pageIndex, batchSizes, summary);
        await this.sleep(config.pageDelayMs);
      }
    }

    if (group.size > 0) {
      await this.completeBatch(group, pageIndex, batchSizes, summary);
    }

    return { pageIndex, rows: rows.length, batchSizes };
  }

  private async completeBatch(
    group: TaskGroup<IngestOutcome>,
    pageIndex: number,
    batchSizes: number[],
    summary: RunSummary,
  ): Promise<void> {
    const outcomes = await group.drain();
    const failed = outcomes.filter((outcome) => outcome.status === "failed").length;

    batchSizes.push(outcomes.length);
    summary.ingested += outcomes.length - failed;
    summary.failed += failed;
    this.deps.metrics.incrementCounter("batches_completed", 1);
    this.deps.logger.info("batch_complete", { pageIndex, size: outcomes.length, failed });
  }

  private async ingest(row: RowDescriptor): Promise<IngestOutcome> {
    const outcome = await this.deps.ingestor.processRow(row);

    try {
      await this.deps.store.recordRowOutcome({
        runId: this.deps.runId,
        pageNumber: row.pageIndex + 1,
        pdfUrl: row.pdfUrl,
        caseNumber: row.caseNumber || undefined,
        status: outcome.status,
        error: outcome.status === "failed" ? outcome.error.message : undefined,
        recordedAt: new Date().toISOString(),
      });
    } catch (error) {
      this.deps.logger.warn("row_outcome_not_recorded", { url: row.pdfUrl, error: errorMessage(error) });
    }

    return outcome;
  }
}
