import { AppConfig } from "../config";
import { NavigationError } from "../core/errors";
import { exponentialBackoff, withRetry } from "../core/retry";
import { SleepFn } from "../core/sleep";
import type { PageLike } from "../browser";
import { Logger, MetricsRegistry } from "../observability";
import type { RowDescriptor } from "../types";
import { hasNextPageLink, parseListingRows } from "./htmlParser";

type WalkerConfig = Pick<AppConfig, "targetUrl" | "navigationTimeoutMs" | "maxRetries">;

interface ListingWalkerDeps {
  page: PageLike;
  config: WalkerConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: SleepFn;
}

export function buildListingPageUrl(targetUrl: string, pageIndex: number): string {
  const url = new URL(targetUrl);
  url.searchParams.set("page", String(pageIndex));
  return url.toString();
}

export class ListingWalker {
  private readonly page: PageLike;
  private readonly config: WalkerConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly sleep?: SleepFn;
  private readonly origin: string;

  constructor(deps: ListingWalkerDeps) {
    this.page = deps.page;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.sleep = deps.sleep;
    this.origin = new URL(deps.config.targetUrl).origin;
  }

  async goToPage(pageIndex: number): Promise<void> {
    const pageUrl = buildListingPageUrl(this.config.targetUrl, pageIndex);
    const timeout = this.config.navigationTimeoutMs;
    const stopTimer = this.metrics.startTimer("page_fetch_ms");

    try {
      await withRetry(
        async () => {
          await this.page.goto(pageUrl, { waitUntil: "domcontentloaded", timeout });
          await this.page.waitForLoadState("networkidle", { timeout });
        },
        {
          maxAttempts: this.config.maxRetries,
          backoff: exponentialBackoff(),
          sleep: this.sleep,
          onRetry: (attempt, error, delayMs) =>
            this.logger.warn("listing_navigation_retry", {
              url: pageUrl,
              pageIndex,
              attempt,
              delayMs,
              error: error instanceof Error ? error.message : String(error),
            }),
        },
      );
    } catch (error) {
      throw new NavigationError(`Could not load listing page ${pageIndex + 1} (${pageUrl})`, pageIndex, { cause: error });
    }

    this.metrics.incrementCounter("pages_crawled", 1);
    this.logger.debug("listing_page_loaded", { url: pageUrl, pageIndex, durationMs: stopTimer() });
  }

  async listRows(): Promise<RowDescriptor[]> {
    const rows = parseListingRows(await this.page.content(), this.origin);
    this.metrics.incrementCounter("rows_discovered", rows.length);
    return rows;
  }

  async hasNextPage(): Promise<boolean> {
    return hasNextPageLink(await this.page.content());
  }
}
