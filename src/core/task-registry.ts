/**
 * TaskRegistry is the authoritative in-memory view of every live task.
 * Purpose: apply state-machine transitions, keep the FIFO order of pending tasks,
 * and enforce the ownership guard on every requester-facing read.
 * Assumptions: mutations arrive on one event loop; each task id is driven by at most one worker.
 * Usage: registry.insert(task); registry.get(id, requester); registry.markProcessing(id).
 */

import { TaskNotFoundError } from "./errors.js";
import { assertTaskAccess, type Requester } from "./ownership.js";
import {
  markTaskCancelled,
  markTaskCompleted,
  markTaskFailed,
  markTaskProcessing,
  markTaskProgress,
  type ResultRef,
  type Task,
  type TaskErrorInfo,
  type TaskStatus,
} from "./task.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskView = {
  task_id: string;
  owner_id: string;
  status: TaskStatus;
  progress: number;
  message: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  result_ref: ResultRef | null;
  error: TaskErrorInfo | null;
  queue_position: number | null;
};

export type ListTasksOptions = {
  page?: number;
  pageSize?: number;
  status?: TaskStatus;
};

export type TaskPage = {
  tasks: TaskView[];
  total: number;
  page: number;
  pageSize: number;
};

export type TaskStatusCounts = Record<TaskStatus, number> & { total: number };

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

// =============================================================================
// REGISTRY
// =============================================================================

export class TaskRegistry {
  private readonly tasks = new Map<string, Task>();
  // Pending ids ordered by (created_at, id); the head is the next task to admit.
  private readonly pendingOrder: string[] = [];
  private readonly lastActivity = new Map<string, string>();

  get size(): number {
    return this.tasks.size;
  }

  insert(task: Task): void {
    if (this.tasks.has(task.id)) {
      throw new Error(`Task ${task.id} is already registered`);
    }

    this.tasks.set(task.id, task);
    if (task.status === "pending") {
      this.insertPending(task);
    }
  }

  hydrate(tasks: Iterable<Task>): number {
    let loaded = 0;
    for (const task of tasks) {
      if (this.tasks.has(task.id)) continue;
      this.insert(task);
      loaded += 1;
    }
    return loaded;
  }

  remove(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    if (!task) return undefined;

    this.tasks.delete(taskId);
    this.lastActivity.delete(taskId);
    this.dropPending(taskId);
    return task;
  }

  // Unguarded lookup for the scheduler and sweeper; never hand the result to a requester.
  peek(taskId: string): Task | undefined {
    return this.tasks.get(taskId);
  }

  snapshot(): Task[] {
    return [...this.tasks.values()];
  }

  oldestPending(): Task | undefined {
    const head = this.pendingOrder[0];
    return head === undefined ? undefined : this.tasks.get(head);
  }

  pendingIds(): string[] {
    return [...this.pendingOrder];
  }

  lastActivityAt(taskId: string): string | undefined {
    return this.lastActivity.get(taskId);
  }

  // =============================================================================
  // GUARDED READS
  // =============================================================================

  require(taskId: string, requester: Requester): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    assertTaskAccess(task, requester);
    return task;
  }

  get(taskId: string, requester: Requester): TaskView {
    return this.toView(this.require(taskId, requester));
  }

  list(ownerId: string, options: ListTasksOptions = {}): TaskPage {
    const page = Math.max(1, Math.trunc(finiteOr(options.page, 1)));
    const pageSize = Math.min(
      MAX_PAGE_SIZE,
      Math.max(1, Math.trunc(finiteOr(options.pageSize, DEFAULT_PAGE_SIZE))),
    );

    const owned = [...this.tasks.values()]
      .filter((task) => task.owner_id === ownerId)
      .filter((task) => options.status === undefined || task.status === options.status)
      .sort(compareNewestFirst);

    const start = (page - 1) * pageSize;
    const tasks = owned.slice(start, start + pageSize).map((task) => this.toView(task));

    return { tasks, total: owned.length, page, pageSize };
  }

  queuePosition(taskId: string): number | null {
    const index = this.pendingOrder.indexOf(taskId);
    return index >= 0 ? index + 1 : null;
  }

  counts(): TaskStatusCounts {
    const counts: TaskStatusCounts = {
      total: this.tasks.size,
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };

    for (const task of this.tasks.values()) {
      counts[task.status] += 1;
    }

    return counts;
  }

  toView(task: Task): TaskView {
    return {
      task_id: task.id,
      owner_id: task.owner_id,
      status: task.status,
      progress: task.progress,
      message: task.message,
      created_at: task.created_at,
      started_at: task.started_at,
      completed_at: task.completed_at,
      result_ref: task.result_ref ? { ...task.result_ref } : null,
      error: task.error ? { ...task.error } : null,
      queue_position: task.status === "pending" ? this.queuePosition(task.id) : null,
    };
  }

  // =============================================================================
  // TRANSITIONS
  // =============================================================================

  markProcessing(taskId: string, now: string = isoNow()): Task {
    const task = this.requireKnown(taskId);
    markTaskProcessing(task, now);
    this.dropPending(taskId);
    this.lastActivity.set(taskId, now);
    return task;
  }

  markProgress(taskId: string, progress: number, message?: string, now: string = isoNow()): boolean {
    const task = this.tasks.get(taskId);
    if (!task) return false;

    const applied = markTaskProgress(task, progress, message);
    if (applied) {
      this.lastActivity.set(taskId, now);
    }
    return applied;
  }

  markCompleted(taskId: string, resultRef: ResultRef, now: string = isoNow()): Task {
    const task = this.requireKnown(taskId);
    markTaskCompleted(task, resultRef, now);
    this.lastActivity.delete(taskId);
    return task;
  }

  markFailed(taskId: string, error: TaskErrorInfo, now: string = isoNow()): Task {
    const task = this.requireKnown(taskId);
    markTaskFailed(task, error, now);
    this.lastActivity.delete(taskId);
    return task;
  }

  markCancelled(taskId: string, now: string = isoNow()): Task {
    const task = this.requireKnown(taskId);
    markTaskCancelled(task, now);
    this.dropPending(taskId);
    this.lastActivity.delete(taskId);
    return task;
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private requireKnown(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private insertPending(task: Task): void {
    let low = 0;
    let high = this.pendingOrder.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      const other = this.tasks.get(this.pendingOrder[mid]);
      if (other && compareFifo(other, task) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    this.pendingOrder.splice(low, 0, task.id);
  }

  private dropPending(taskId: string): void {
    const index = this.pendingOrder.indexOf(taskId);
    if (index >= 0) {
      this.pendingOrder.splice(index, 1);
    }
  }
}

export function compareFifo(a: Pick<Task, "id" | "created_at">, b: Pick<Task, "id" | "created_at">): number {
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

function compareNewestFirst(a: Task, b: Task): number {
  return compareFifo(b, a);
}
