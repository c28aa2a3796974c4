import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import { TaskSchema, type Task } from "./task.js";

// =============================================================================
// PORT
// =============================================================================

export interface TaskRecordStore {
  saveSnapshot(task: Task): Promise<void>;
  deleteSnapshot(taskId: string): Promise<void>;
  // Rows that fail validation come back in `skipped` instead of failing the load.
  loadAll(): Promise<LoadedSnapshots>;
  close(): void;
}

export type SkippedSnapshot = { id: string; reason: string };

export type LoadedSnapshots = {
  tasks: Task[];
  skipped: SkippedSnapshot[];
};

type TaskRow = {
  id: string;
  owner_id: string;
  status: string;
  progress: number;
  message: string;
  params_json: string;
  result_ref_json: string | null;
  error_json: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
};

// =============================================================================
// SQLITE
// =============================================================================

export class SqliteTaskRecordStore implements TaskRecordStore {
  private closed = false;

  private constructor(private readonly db: Database.Database) {}

  static open(dbPath: string): SqliteTaskRecordStore {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    const store = new SqliteTaskRecordStore(db);
    store.ensureSchema();
    return store;
  }

  async saveSnapshot(task: Task): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO tasks (
           id, owner_id, status, progress, message, params_json,
           result_ref_json, error_json, created_at, started_at, completed_at
         ) VALUES (
           @id, @owner_id, @status, @progress, @message, @params_json,
           @result_ref_json, @error_json, @created_at, @started_at, @completed_at
         )
         ON CONFLICT(id) DO UPDATE SET
           status = excluded.status,
           progress = excluded.progress,
           message = excluded.message,
           result_ref_json = excluded.result_ref_json,
           error_json = excluded.error_json,
           started_at = excluded.started_at,
           completed_at = excluded.completed_at`,
      )
      .run(toRow(task));
  }

  async deleteSnapshot(taskId: string): Promise<void> {
    this.db.prepare("DELETE FROM tasks WHERE id = ?").run(taskId);
  }

  async loadAll(): Promise<LoadedSnapshots> {
    const rows = this.db
      .prepare<[], TaskRow>("SELECT * FROM tasks ORDER BY created_at ASC, id ASC")
      .all();

    const tasks: Task[] = [];
    const skipped: SkippedSnapshot[] = [];

    for (const row of rows) {
      const parsed = parseRow(row);
      if (parsed.ok) {
        tasks.push(parsed.task);
      } else {
        skipped.push({ id: row.id, reason: parsed.reason });
      }
    }

    return { tasks, skipped };
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  private ensureSchema(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        owner_id TEXT NOT NULL,
        status TEXT NOT NULL,
        progress REAL NOT NULL DEFAULT 0,
        message TEXT NOT NULL DEFAULT '',
        params_json TEXT NOT NULL,
        result_ref_json TEXT,
        error_json TEXT,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_owner ON tasks (owner_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks (status);
    `);
  }
}

// =============================================================================
// ROW MAPPING
// =============================================================================

function toRow(task: Task): TaskRow {
  return {
    id: task.id,
    owner_id: task.owner_id,
    status: task.status,
    progress: task.progress,
    message: task.message,
    params_json: JSON.stringify(task.params),
    result_ref_json: task.result_ref ? JSON.stringify(task.result_ref) : null,
    error_json: task.error ? JSON.stringify(task.error) : null,
    created_at: task.created_at,
    started_at: task.started_at,
    completed_at: task.completed_at,
  };
}

function parseRow(row: TaskRow): { ok: true; task: Task } | { ok: false; reason: string } {
  let candidate: unknown;
  try {
    candidate = {
      id: row.id,
      owner_id: row.owner_id,
      status: row.status,
      progress: row.progress,
      message: row.message,
      params: JSON.parse(row.params_json),
      result_ref: row.result_ref_json ? JSON.parse(row.result_ref_json) : null,
      error: row.error_json ? JSON.parse(row.error_json) : null,
      created_at: row.created_at,
      started_at: row.started_at,
      completed_at: row.completed_at,
    };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = TaskSchema.safeParse(candidate);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.toString() };
  }
  return { ok: true, task: parsed.data };
}
