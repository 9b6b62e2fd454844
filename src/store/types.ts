export type RunStatus = "running" | "completed" | "failed";

export type RowStatus = "ingested" | "failed";

export interface RowOutcomeRecord {
  runId: string;
  pageNumber: number;
  pdfUrl: string;
  caseNumber?: string;
  status: RowStatus;
  error?: string;
  recordedAt: string;
}

export interface RunStats {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
  ingested: number;
  failed: number;
}

/** Local ledger of harvest runs and the outcome of every row they touched. */
export interface RunStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string): Promise<void>;
  recordRowOutcome(outcome: RowOutcomeRecord): Promise<void>;
  listFailedRows(runId: string): Promise<RowOutcomeRecord[]>;
  getRunStats(runId: string): Promise<RunStats | undefined>;
  close(): Promise<void>;
}
