import type { JudgmentRecord } from "../types";

/** Destination of judgment records. Must tolerate concurrent inserts. */
export interface RecordSink {
  insert(record: JudgmentRecord): Promise<void>;
}
