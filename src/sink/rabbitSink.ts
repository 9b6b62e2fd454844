import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { withRetry } from "../core/retry";
import { SleepFn } from "../core/sleep";
import type { JudgmentRecord } from "../types";
import { BaseSink } from "./baseSink";
import { toJudgmentRow } from "./rows";

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  table: string;
  exchange?: string;
  routingKey?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: (url: string) => Promise<ConnectionLike>;
  sleep?: SleepFn;
}

/**
 * Publishes each record to a durable topic exchange and waits for the broker's confirm.
 * Each attempt opens its own connection, so a retry never reuses a broken channel.
 */
export class RabbitSink extends BaseSink {
  private readonly connectionUrl: string;
  private readonly table: string;
  private readonly exchange: string;
  private readonly routingKey: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: (url: string) => Promise<ConnectionLike>;
  private readonly sleep?: SleepFn;

  constructor(options: RabbitSinkOptions) {
    super();
    this.connectionUrl = this.ensureConfigured("RabbitMQ URL", options.connectionUrl);
    this.table = options.table;
    this.exchange = options.exchange ?? "judgments.harvester";
    this.routingKey = options.routingKey ?? `${options.table}.insert`;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url) => amqpConnect(url));
    this.sleep = options.sleep;
  }

  async insert(record: JudgmentRecord): Promise<void> {
    const content = Buffer.from(
      JSON.stringify({
        table: this.table,
        sentAt: new Date().toISOString(),
        record: toJudgmentRow(record),
      }),
    );
    const publishOptions: Options.Publish = {
      persistent: true,
      contentType: "application/json",
      headers: { "x-table": this.table, "x-idempotency-key": `${this.table}:${record.downloadUrl}` },
    };

    await withRetry(() => this.publishConfirmed(content, publishOptions), {
      maxAttempts: this.maxRetries + 1,
      backoff: (attempt) => this.retryDelayMs * attempt,
      sleep: this.sleep,
    });
  }

  private async publishConfirmed(content: Buffer, publishOptions: Options.Publish): Promise<void> {
    const connection = await this.connectFn(this.connectionUrl);
    try {
      const channel = await connection.createConfirmChannel();
      try {
        await channel.assertExchange(this.exchange, "topic", { durable: true });
        channel.publish(this.exchange, this.routingKey, content, publishOptions);
        await channel.waitForConfirms();
      } finally {
        await channel.close().catch(() => undefined);
      }
    } finally {
      await connection.close().catch(() => undefined);
    }
  }
}
