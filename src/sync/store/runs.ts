import type { SqliteDatabase } from "./db";
import { nowIso } from "./db";
import type { SyncMode } from "@/sync/types";

export type RunStatus = "running" | "completed" | "failed";

export interface RunCounts {
  shopsTotal: number;
  shopsSuccess: number;
  shopsFailed: number;
  chatsCreated: number;
  chatsUpdated: number;
  chatsFailed: number;
  messagesCreated: number;
}

export interface SyncRunRecord {
  id: number;
  runId: string;
  startedAt: string;
  completedAt: string | null;
  mode: SyncMode;
  counts: Partial<RunCounts>;
  status: RunStatus;
}

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  mode: string;
  counts_json: string;
  status: string;
}

export function createRun(db: SqliteDatabase, runId: string, mode: SyncMode, startedAt = nowIso()): void {
  db.prepare(`
    INSERT INTO sync_runs (run_id, started_at, mode, counts_json, status)
    VALUES (?, ?, ?, ?, ?)
  `).run(runId, startedAt, mode, "{}", "running");
}

export function completeRun(
  db: SqliteDatabase,
  runId: string,
  counts: RunCounts,
  status: Exclude<RunStatus, "running">,
): void {
  db.prepare(`
    UPDATE sync_runs
    SET completed_at = ?, counts_json = ?, status = ?
    WHERE run_id = ?
  `).run(nowIso(), JSON.stringify(counts), status, runId);
}

export function findRun(db: SqliteDatabase, runId: string): SyncRunRecord | undefined {
  const row = db.prepare("SELECT * FROM sync_runs WHERE run_id = ?").get(runId) as RawRunRow | undefined;
  return row ? toRunRecord(row) : undefined;
}

export function latestRuns(db: SqliteDatabase, limit = 10): SyncRunRecord[] {
  const rows = db
    .prepare("SELECT * FROM sync_runs ORDER BY id DESC LIMIT ?")
    .all(limit) as RawRunRow[];
  return rows.map(toRunRecord);
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    mode: row.mode as SyncMode,
    counts: JSON.parse(row.counts_json) as Partial<RunCounts>,
    status: row.status as RunStatus,
  };
}
