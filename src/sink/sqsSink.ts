import crypto from "node:crypto";
import { SendMessageCommand, SQSClient } from "@aws-sdk/client-sqs";
import type { JudgmentRecord } from "../types";
import { BaseSink } from "./baseSink";
import { toJudgmentRow } from "./rows";

interface SqsClientLike {
  send(command: SendMessageCommand): Promise<{ MessageId?: string }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  table: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
}

/** Publishes one SQS message per record for a downstream writer to insert. */
export class SqsSink extends BaseSink {
  private readonly queueUrl: string;
  private readonly table: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;

  constructor(options: SqsSinkOptions) {
    super();
    this.queueUrl = this.ensureConfigured("SQS queue URL", options.queueUrl);
    this.table = options.table;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? this.queueUrl.endsWith(".fifo");
    this.groupId = options.groupId ?? "judgment-harvester";
  }

  async insert(record: JudgmentRecord): Promise<void> {
    const command = new SendMessageCommand({
      QueueUrl: this.queueUrl,
      MessageBody: JSON.stringify({
        table: this.table,
        sentAt: new Date().toISOString(),
        record: toJudgmentRow(record),
      }),
      ...(this.fifo
        ? {
            MessageGroupId: this.groupId,
            MessageDeduplicationId: crypto.createHash("sha256").update(record.downloadUrl).digest("hex"),
          }
        : {}),
    });

    const response = await this.client.send(command);
    if (!response.MessageId) {
      throw new Error(`SQS did not acknowledge record for ${record.downloadUrl}`);
    }
  }
}
