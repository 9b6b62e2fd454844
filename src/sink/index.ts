import { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import { SupabaseSink } from "./supabaseSink";
import { RecordSink } from "./types";

export function createSink(config: AppConfig, runId: string): RecordSink {
  const table = config.tableName;

  switch (config.sinkType) {
    case "supabase":
      return new SupabaseSink({ url: config.supabaseUrl, serviceKey: config.supabaseServiceKey, table });
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDirs.manifests, table, runId);
    case "http":
      return new HttpSink({ endpoint: config.httpSink.endpoint, token: config.httpSink.token, table });
    case "sqs":
      return new SqsSink({ queueUrl: config.sqsQueueUrl, table });
    case "rabbit":
      return new RabbitSink({ connectionUrl: config.rabbitUrl, table });
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonlSink";
export * from "./rabbitSink";
export * from "./rows";
export * from "./sqsSink";
export * from "./supabaseSink";
export * from "./types";
