import { Command, InvalidArgumentError } from "commander";

import { createAppContext } from "../app/context.js";
import type { QueueConfig } from "../core/config.js";
import type { Requester } from "../core/ownership.js";
import { TaskStatusSchema, type TaskStatus } from "../core/task.js";
import { SqliteTaskRecordStore } from "../core/task-record-store.js";
import { DEFAULT_PAGE_SIZE, TaskRegistry, type TaskView } from "../core/task-registry.js";

import { loadConfigForCli } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

export type TasksListOptions = {
  owner: string;
  status?: string;
  page?: number;
  pageSize?: number;
  json?: boolean;
};

export type TasksShowOptions = {
  taskId: string;
  json?: boolean;
};

export type TasksSweepOptions = {
  dryRun?: boolean;
  json?: boolean;
};

type TaskListRow = {
  taskId: string;
  status: string;
  progress: string;
  createdAt: string;
  position: string;
};

// Offline reads act on behalf of the operator and see every owner's tasks.
const OPERATOR: Requester = { id: "operator", isAdmin: true };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerTasksCommand(program: Command): void {
  const tasks = program.command("tasks").description("Inspect and maintain the task record store");

  tasks
    .command("list")
    .description("List an owner's tasks, newest first")
    .requiredOption("--owner <id>", "Owner id")
    .option("--status <status>", "Only tasks in this status")
    .option("--page <n>", "Page number (1-based)", parsePositiveIntOption)
    .option("--page-size <n>", "Tasks per page", parsePositiveIntOption)
    .option("--json", "Print JSON", false)
    .action(async (opts: TasksListOptions, command: Command) => {
      await tasksListCommand(resolveConfig(command), opts);
    });

  tasks
    .command("show")
    .description("Show one stored task")
    .argument("<taskId>", "Task ID")
    .option("--json", "Print JSON", false)
    .action(async (taskId: string, opts: { json?: boolean }, command: Command) => {
      await tasksShowCommand(resolveConfig(command), { taskId, json: opts.json });
    });

  tasks
    .command("sweep")
    .description("Run one retention pass against the store (stop the server first)")
    .option("--dry-run", "Report what would be evicted or reclaimed", false)
    .option("--json", "Print JSON", false)
    .action(async (opts: TasksSweepOptions, command: Command) => {
      await tasksSweepCommand(resolveConfig(command), opts);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function tasksListCommand(config: QueueConfig, opts: TasksListOptions): Promise<void> {
  const status = parseStatusOption(opts.status);
  if (status === null) {
    console.log(`Status must be one of: ${TaskStatusSchema.options.join(", ")}.`);
    process.exitCode = 1;
    return;
  }

  const registry = await loadRegistry(config);
  const page = registry.list(opts.owner, {
    page: opts.page ?? 1,
    pageSize: opts.pageSize ?? DEFAULT_PAGE_SIZE,
    status,
  });

  if (opts.json) {
    console.log(JSON.stringify(page, null, 2));
    return;
  }

  if (page.tasks.length === 0) {
    console.log(`No tasks found for owner ${opts.owner}.`);
    return;
  }

  printTaskRows(opts.owner, page.tasks.map(buildTaskListRow));
  const pages = Math.ceil(page.total / page.pageSize);
  console.log(`Page ${page.page} of ${pages} (${page.total} task(s)).`);
}

export async function tasksShowCommand(config: QueueConfig, opts: TasksShowOptions): Promise<void> {
  const registry = await loadRegistry(config);
  const task = registry.peek(opts.taskId);
  if (!task) {
    console.log(`Task ${opts.taskId} not found.`);
    process.exitCode = 1;
    return;
  }

  const view = registry.get(task.id, OPERATOR);
  if (opts.json) {
    console.log(JSON.stringify({ ...view, params: task.params }, null, 2));
    return;
  }

  console.log(`Task ${view.task_id}`);
  console.log(`  owner:     ${view.owner_id}`);
  console.log(`  status:    ${view.status}${view.queue_position ? ` (#${view.queue_position})` : ""}`);
  console.log(`  progress:  ${formatProgress(view.progress)} ${view.message}`);
  console.log(`  created:   ${formatTimestamp(view.created_at)}`);
  if (view.started_at) console.log(`  started:   ${formatTimestamp(view.started_at)}`);
  if (view.completed_at) console.log(`  finished:  ${formatTimestamp(view.completed_at)}`);
  if (view.result_ref) console.log(`  audio:     ${view.result_ref.path} (${view.result_ref.size_bytes} bytes)`);
  if (view.error) console.log(`  error:     ${view.error.code}: ${view.error.message}`);
}

export async function tasksSweepCommand(config: QueueConfig, opts: TasksSweepOptions): Promise<void> {
  const ctx = createAppContext({ config, component: "cli" });
  try {
    await ctx.queue.boot();
    const report = opts.dryRun ? ctx.queue.planSweep() : await ctx.queue.sweep();

    if (opts.json) {
      console.log(JSON.stringify({ dry_run: opts.dryRun === true, ...report }, null, 2));
      return;
    }

    const verb = opts.dryRun ? "Would evict" : "Evicted";
    console.log(`${verb} ${report.evicted.length} task(s).`);
    for (const taskId of report.evicted) {
      console.log(`- ${taskId}`);
    }

    const reclaimVerb = opts.dryRun ? "Would reclaim" : "Reclaimed";
    console.log(`${reclaimVerb} ${report.reclaimed.length} stuck task(s).`);
    for (const taskId of report.reclaimed) {
      console.log(`- ${taskId}`);
    }
  } finally {
    await ctx.close();
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

function buildTaskListRow(view: TaskView): TaskListRow {
  return {
    taskId: view.task_id,
    status: view.status,
    progress: formatProgress(view.progress),
    createdAt: formatTimestamp(view.created_at),
    position: view.queue_position === null ? "-" : String(view.queue_position),
  };
}

function printTaskRows(owner: string, rows: TaskListRow[]): void {
  const headers: TaskListRow = {
    taskId: "Task",
    status: "Status",
    progress: "Progress",
    createdAt: "Created",
    position: "Queue",
  };
  const columns: (keyof TaskListRow)[] = ["taskId", "status", "progress", "createdAt", "position"];
  const widths = Object.fromEntries(
    columns.map((column) => [
      column,
      columnWidth(
        rows.map((row) => row[column]),
        headers[column],
      ),
    ]),
  );

  const render = (row: TaskListRow): string =>
    columns
      .map((column) => pad(row[column], widths[column] ?? 0))
      .join("  ")
      .trimEnd();

  console.log(`Tasks for owner ${owner}:`);
  console.log(render(headers));
  for (const row of rows) {
    console.log(render(row));
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

function resolveConfig(command: Command): QueueConfig {
  const globals = command.optsWithGlobals<{ config?: string }>();
  return loadConfigForCli({ explicitConfigPath: globals.config }).config;
}

async function loadRegistry(config: QueueConfig): Promise<TaskRegistry> {
  const store = SqliteTaskRecordStore.open(config.database_path);
  try {
    const { tasks, skipped } = await store.loadAll();
    for (const entry of skipped) {
      console.warn(`Warning: skipped unreadable task record ${entry.id}: ${entry.reason}`);
    }
    const registry = new TaskRegistry();
    registry.hydrate(tasks);
    return registry;
  } finally {
    store.close();
  }
}

export function parsePositiveIntOption(raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(value) || value < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return value;
}

// undefined: no filter; null: not a known status.
function parseStatusOption(raw: string | undefined): TaskStatus | undefined | null {
  if (raw === undefined) return undefined;
  const parsed = TaskStatusSchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
}

function formatProgress(progress: number): string {
  return `${Math.round(progress * 100)}%`;
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}
