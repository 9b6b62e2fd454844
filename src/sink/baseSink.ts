import { ConfigError } from "../core/errors";
import type { JudgmentRecord } from "../types";
import { RecordSink } from "./types";

export abstract class BaseSink implements RecordSink {
  abstract insert(record: JudgmentRecord): Promise<void>;

  protected ensureConfigured<T extends string>(name: string, value: T | undefined): T {
    if (value === undefined || value === "") {
      throw new ConfigError(`${name} is not configured`);
    }
    return value;
  }
}
