import { AuthSession } from "../auth";
import { BrowserLauncher, BrowserSession, withBrowserSession } from "../browser";
import { AppConfig } from "../config";
import { ListingWalker } from "../crawl";
import { PdfParseExtractor } from "../extract/pdfExtractor";
import { JudgmentIngestor } from "../ingest";
import { Logger, MetricsRegistry } from "../observability";
import { PageBatchScheduler, RunSummary } from "../pipeline/pageBatchScheduler";
import { RecordSink } from "../sink";
import { RunStore } from "../store";
import { createFetch } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: RecordSink;
}

export function createScheduler(ctx: CommandContext, session: BrowserSession): PageBatchScheduler {
  const { config, logger, metrics } = ctx;

  return new PageBatchScheduler({
    runId: ctx.runId,
    config,
    logger: logger.child("scheduler"),
    metrics,
    store: ctx.store,
    auth: new AuthSession({
      page: session.page,
      config,
      logger: logger.child("auth"),
      fetchFn: createFetch(config.ignoreHttpsErrors),
    }),
    walker: new ListingWalker({
      page: session.page,
      config,
      logger: logger.child("walker"),
      metrics,
    }),
    ingestor: new JudgmentIngestor({
      request: session.request,
      extractor: new PdfParseExtractor(),
      sink: ctx.sink,
      config,
      logger: logger.child("ingestor"),
      metrics,
    }),
  });
}

/**
 * One full harvest inside a browser session, bracketed by run bookkeeping in the store.
 */
export async function runHarvest(ctx: CommandContext, launcher?: BrowserLauncher): Promise<RunSummary> {
  const { config } = ctx;
  await ctx.store.startRun(ctx.runId, new Date().toISOString());
  ctx.logger.info("harvest_start", {
    targetUrl: config.targetUrl,
    startPage: config.startPage,
    endPage: config.endPage ?? "unbounded",
    sinkType: config.sinkType,
    table: config.tableName,
  });

  try {
    const summary = await withBrowserSession(
      {
        headless: config.headless,
        executablePath: config.chromiumExecutablePath,
        userAgent: config.userAgent,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
      },
      ctx.logger.child("browser"),
      (session) => createScheduler(ctx, session).run(),
      launcher,
    );
    await ctx.store.finishRun(ctx.runId, "completed", new Date().toISOString());
    ctx.logger.info("harvest_complete", { ingested: summary.ingested, failed: summary.failed, pages: summary.pages.length });
    return summary;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }
}
