import { createClient } from "@supabase/supabase-js";
import ws from "ws";
import type { JudgmentRecord, JudgmentRow } from "../types";
import { BaseSink } from "./baseSink";
import { toJudgmentRow } from "./rows";

export interface TableWriteError {
  message: string;
  code?: string;
}

/** Narrow view of the Supabase client: one insert into one table. */
export interface TableWriter {
  insert(table: string, row: JudgmentRow): Promise<TableWriteError | null>;
}

export interface SupabaseSinkOptions {
  url?: string;
  serviceKey?: string;
  table: string;
  writer?: TableWriter;
}

function createSupabaseWriter(url: string, serviceKey: string): TableWriter {
  const client = createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    // Node 20 has no global WebSocket for the realtime client.
    realtime: { transport: ws },
  });

  return {
    insert: async (table, row) => {
      const { error } = await client.from(table).insert(row);
      return error ? { message: error.message, code: error.code } : null;
    },
  };
}

export class SupabaseSink extends BaseSink {
  private readonly table: string;
  private readonly writer: TableWriter;

  constructor(options: SupabaseSinkOptions) {
    super();
    this.table = options.table;
    this.writer =
      options.writer ??
      createSupabaseWriter(
        this.ensureConfigured("Supabase URL", options.url),
        this.ensureConfigured("Supabase service key", options.serviceKey),
      );
  }

  async insert(record: JudgmentRecord): Promise<void> {
    const error = await this.writer.insert(this.table, toJudgmentRow(record));
    if (error) {
      const code = error.code ? ` (${error.code})` : "";
      throw new Error(`Supabase insert into ${this.table} failed${code}: ${error.message}`);
    }
  }
}
