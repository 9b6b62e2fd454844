export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogFields {
  url?: string;
  pageIndex?: number;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "rows_discovered"
  | "rows_ingested"
  | "rows_failed"
  | "batches_completed";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "extract_ms";
