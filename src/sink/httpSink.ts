import { FetchLike } from "../core/fetch";
import { withRetry } from "../core/retry";
import { SleepFn } from "../core/sleep";
import type { JudgmentRecord } from "../types";
import { BaseSink } from "./baseSink";
import { toJudgmentRow } from "./rows";

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  table: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: SleepFn;
}

/** Non-2xx answer from the collector. */
export class HttpSinkError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`HTTP sink returned ${status}: ${body}`);
    this.name = "HttpSinkError";
    this.status = status;
  }

  get retriable(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

/**
 * POSTs each record as JSON to a collector endpoint. Timeouts, 408, 429 and 5xx are
 * retried with a linear delay; other statuses fail the insert at once.
 */
export class HttpSink extends BaseSink {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly table: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: SleepFn;

  constructor(options: HttpSinkOptions) {
    super();
    this.endpoint = this.ensureConfigured("HTTP sink endpoint", options.endpoint);
    this.token = options.token;
    this.table = options.table;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.sleep = options.sleep;
  }

  async insert(record: JudgmentRecord): Promise<void> {
    const body = JSON.stringify({
      table: this.table,
      sentAt: new Date().toISOString(),
      record: toJudgmentRow(record),
    });
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": `${this.table}:${record.downloadUrl}`,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    await withRetry(() => this.post(headers, body), {
      maxAttempts: this.maxRetries + 1,
      backoff: (attempt) => this.retryDelayMs * attempt,
      sleep: this.sleep,
      shouldRetry: (error) => !(error instanceof HttpSinkError) || error.retriable,
    });
  }

  private async post(headers: Record<string, string>, body: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(this.endpoint, { method: "POST", headers, body, signal: controller.signal });
      if (!response.ok) {
        throw new HttpSinkError(response.status, await response.text());
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
