import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { RowOutcomeRecord, RowStatus, RunStats, RunStatus, RunStore } from "./types";

type RunRow = {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  ingested: number;
  failed: number;
};

type OutcomeRow = {
  runId: string;
  pageNumber: number;
  pdfUrl: string;
  caseNumber: string | null;
  status: RowStatus;
  error: string | null;
  recordedAt: string;
};

export class SqliteStore implements RunStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.db = new Database(absolutePath);
    this.db.pragma("journal_mode = WAL");
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, startedAt });
  }

  async finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET status = @status, finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({ runId, status, finishedAt });
  }

  async recordRowOutcome(outcome: RowOutcomeRecord): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO row_outcomes (runId, pageNumber, pdfUrl, caseNumber, status, error, recordedAt)
        VALUES (@runId, @pageNumber, @pdfUrl, @caseNumber, @status, @error, @recordedAt)
      `,
      )
      .run({
        runId: outcome.runId,
        pageNumber: outcome.pageNumber,
        pdfUrl: outcome.pdfUrl,
        caseNumber: outcome.caseNumber ?? null,
        status: outcome.status,
        error: outcome.error ?? null,
        recordedAt: outcome.recordedAt,
      });
  }

  async listFailedRows(runId: string): Promise<RowOutcomeRecord[]> {
    const rows = this.db
      .prepare<[string], OutcomeRow>(
        `
        SELECT runId, pageNumber, pdfUrl, caseNumber, status, error, recordedAt
        FROM row_outcomes
        WHERE runId = ? AND status = 'failed'
        ORDER BY id ASC
      `,
      )
      .all(runId);

    return rows.map((row) => ({
      runId: row.runId,
      pageNumber: row.pageNumber,
      pdfUrl: row.pdfUrl,
      caseNumber: row.caseNumber ?? undefined,
      status: row.status,
      error: row.error ?? undefined,
      recordedAt: row.recordedAt,
    }));
  }

  async getRunStats(runId: string): Promise<RunStats | undefined> {
    const row = this.db
      .prepare<[string], RunRow>(
        `
        SELECT
          r.runId AS runId,
          r.status AS status,
          r.startedAt AS startedAt,
          r.finishedAt AS finishedAt,
          COALESCE(SUM(CASE WHEN o.status = 'ingested' THEN 1 ELSE 0 END), 0) AS ingested,
          COALESCE(SUM(CASE WHEN o.status = 'failed' THEN 1 ELSE 0 END), 0) AS failed
        FROM runs r
        LEFT JOIN row_outcomes o ON o.runId = r.runId
        WHERE r.runId = ?
        GROUP BY r.runId
      `,
      )
      .get(runId);

    if (!row) {
      return undefined;
    }

    return {
      runId: row.runId,
      status: row.status,
      startedAt: row.startedAt,
      finishedAt: row.finishedAt ?? undefined,
      ingested: row.ingested,
      failed: row.failed,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS row_outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        runId TEXT NOT NULL,
        pageNumber INTEGER NOT NULL,
        pdfUrl TEXT NOT NULL,
        caseNumber TEXT NULL,
        status TEXT NOT NULL,
        error TEXT NULL,
        recordedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_row_outcomes_run ON row_outcomes(runId, status);
    `);
  }
}
