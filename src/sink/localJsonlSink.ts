import fs from "node:fs";
import path from "node:path";
import type { JudgmentRecord } from "../types";
import { BaseSink } from "./baseSink";
import { toJudgmentRow } from "./rows";

export class LocalJsonlSink extends BaseSink {
  private readonly filePath: string;
  private readonly table: string;
  private readonly runId: string;

  constructor(manifestsDir: string, table: string, runId: string) {
    super();
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.filePath = path.join(absoluteDir, `${table}.jsonl`);
    this.table = table;
    this.runId = runId;
  }

  get location(): string {
    return this.filePath;
  }

  async insert(record: JudgmentRecord): Promise<void> {
    const line = JSON.stringify({ runId: this.runId, table: this.table, ...toJudgmentRow(record) });
    await fs.promises.appendFile(this.filePath, `${line}\n`, "utf-8");
  }
}
