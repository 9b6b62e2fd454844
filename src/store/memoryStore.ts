import { RowOutcomeRecord, RunStats, RunStatus, RunStore } from "./types";

interface RunEntry {
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
}

export class InMemoryStore implements RunStore {
  private readonly runs = new Map<string, RunEntry>();
  private readonly outcomes: RowOutcomeRecord[] = [];

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { status: "running", startedAt });
  }

  async finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt });
    }
  }

  async recordRowOutcome(outcome: RowOutcomeRecord): Promise<void> {
    this.outcomes.push({ ...outcome });
  }

  async listFailedRows(runId: string): Promise<RowOutcomeRecord[]> {
    return this.outcomes.filter((outcome) => outcome.runId === runId && outcome.status === "failed");
  }

  async getRunStats(runId: string): Promise<RunStats | undefined> {
    const run = this.runs.get(runId);
    if (!run) {
      return undefined;
    }
    const forRun = this.outcomes.filter((outcome) => outcome.runId === runId);
    return {
      runId,
      ...run,
      ingested: forRun.filter((outcome) => outcome.status === "ingested").length,
      failed: forRun.filter((outcome) => outcome.status === "failed").length,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
