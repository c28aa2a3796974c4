/**
 * TaskQueue is the public contract of the service.
 * Purpose: validate and admit submissions, answer guarded reads, and own the lifecycle of
 * the scheduler and sweeper that drive the registry.
 * Assumptions: one TaskQueue per process; the record store holds nothing the registry disagrees with.
 * Usage: const queue = new TaskQueue(opts); await queue.boot(); queue.start(); ... await queue.stop();
 */

import type { Synthesizer } from "../synthesis/synthesizer.js";

import { AdmissionGate } from "./admission-gate.js";
import type { ArtifactStore } from "./artifact-store.js";
import type { QueueConfig } from "./config.js";
import {
  TaskAlreadyTerminalError,
  TaskNotReadyError,
  TaskValidationError,
} from "./errors.js";
import { logQueueEvent, logTaskFailure, type EventLogger } from "./logger.js";
import type { Requester } from "./ownership.js";
import { TaskScheduler } from "./scheduler.js";
import { SnapshotWriter } from "./snapshot-writer.js";
import { RetentionSweeper, type SweepReport } from "./sweeper.js";
import {
  createSynthesisParamsSchema,
  createTask,
  isTerminal,
  type ResultRef,
  type SynthesisParams,
} from "./task.js";
import type { TaskRecordStore } from "./task-record-store.js";
import {
  TaskRegistry,
  type ListTasksOptions,
  type TaskPage,
  type TaskStatusCounts,
  type TaskView,
} from "./task-registry.js";
import { newTaskId, secondsToMs, systemClock, type Clock } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type QueueLimits = Pick<
  QueueConfig,
  "max_concurrent_tasks" | "task_timeout" | "task_retention" | "cleanup_interval" | "max_text_length"
>;

export type TaskQueueOptions = {
  config: QueueLimits;
  synthesizer: Synthesizer;
  store: TaskRecordStore;
  artifacts: ArtifactStore;
  logger: EventLogger;
  clock?: Clock;
  idFactory?: () => string;
};

export type SubmitResult = {
  taskId: string;
  view: TaskView;
};

export type QueueStats = {
  pending: number;
  processing: number;
  max_concurrent: number;
  available_slots: number;
  counts: TaskStatusCounts;
};

export type BootReport = {
  loaded: number;
  orphaned: string[];
  // Stored rows that failed validation; they stay in the store untouched.
  skipped: string[];
};

// =============================================================================
// FACADE
// =============================================================================

export class TaskQueue {
  private readonly registry = new TaskRegistry();
  private readonly gate: AdmissionGate;
  private readonly snapshots: SnapshotWriter;
  private readonly scheduler: TaskScheduler;
  private readonly sweeper: RetentionSweeper;
  private readonly paramsSchema: ReturnType<typeof createSynthesisParamsSchema>;
  private readonly clock: Clock;
  private readonly idFactory: () => string;
  private readonly logger: EventLogger;
  private readonly artifacts: ArtifactStore;
  private readonly store: TaskRecordStore;
  private booted = false;

  constructor(options: TaskQueueOptions) {
    const { config } = options;

    this.clock = options.clock ?? systemClock;
    this.idFactory = options.idFactory ?? newTaskId;
    this.logger = options.logger;
    this.artifacts = options.artifacts;
    this.store = options.store;
    this.paramsSchema = createSynthesisParamsSchema(config.max_text_length);

    this.gate = new AdmissionGate(config.max_concurrent_tasks);
    this.snapshots = new SnapshotWriter(options.store, options.logger);

    const taskTimeoutMs = secondsToMs(config.task_timeout);
    this.scheduler = new TaskScheduler({
      registry: this.registry,
      gate: this.gate,
      synthesizer: options.synthesizer,
      artifacts: options.artifacts,
      snapshots: this.snapshots,
      logger: options.logger,
      taskTimeoutMs,
      clock: this.clock,
    });
    this.sweeper = new RetentionSweeper({
      registry: this.registry,
      scheduler: this.scheduler,
      artifacts: options.artifacts,
      snapshots: this.snapshots,
      logger: options.logger,
      retentionMs: secondsToMs(config.task_retention),
      taskTimeoutMs,
      intervalMs: secondsToMs(config.cleanup_interval),
      clock: this.clock,
    });
  }

  get maxConcurrent(): number {
    return this.gate.limit;
  }

  // =============================================================================
  // LIFECYCLE
  // =============================================================================

  // Rebuilds the registry from stored snapshots. Processing tasks have no live
  // execution after a restart; the first sweep fails them as interrupted.
  async boot(): Promise<BootReport> {
    if (this.booted) return { loaded: 0, orphaned: [], skipped: [] };
    this.booted = true;

    const { tasks, skipped } = await this.store.loadAll();
    const loaded = this.registry.hydrate(tasks);
    const orphaned = tasks.filter((task) => task.status === "processing").map((task) => task.id);

    for (const entry of skipped) {
      logQueueEvent(this.logger, "task.snapshot_invalid", { taskId: entry.id, reason: entry.reason });
    }
    logQueueEvent(this.logger, "queue.boot", {
      loaded,
      pending: this.registry.pendingIds().length,
      orphaned: orphaned.length,
      skipped: skipped.length,
    });
    return { loaded, orphaned, skipped: skipped.map((entry) => entry.id) };
  }

  start(options: { sweeper?: boolean } = {}): void {
    this.scheduler.start();
    if (options.sweeper ?? true) {
      this.sweeper.start();
    }
  }

  async stop(): Promise<void> {
    await this.sweeper.stop();
    await this.scheduler.stop();
    await this.snapshots.flush();
  }

  sweep(): Promise<SweepReport> {
    return this.sweeper.sweep();
  }

  planSweep(): SweepReport {
    return this.sweeper.plan();
  }

  // Resolves once every queued snapshot write has settled.
  flush(): Promise<void> {
    return this.snapshots.flush();
  }

  // =============================================================================
  // OPERATIONS
  // =============================================================================

  submit(ownerId: string, input: unknown): SubmitResult {
    if (ownerId.trim() === "") {
      throw new TaskValidationError("owner id must be a non-empty string", [
        { path: "owner_id", message: "Required" },
      ]);
    }

    const params = this.parseParams(input);
    const task = createTask({
      id: this.idFactory(),
      ownerId,
      params,
      now: this.clock.now().toISOString(),
    });

    this.registry.insert(task);
    this.snapshots.save(task);
    logQueueEvent(this.logger, "task.submitted", {
      taskId: task.id,
      owner_id: ownerId,
      text_length: params.text.length,
    });
    this.scheduler.notify();

    return { taskId: task.id, view: this.registry.toView(task) };
  }

  get(taskId: string, requester: Requester): TaskView {
    return this.registry.get(taskId, requester);
  }

  list(ownerId: string, options: ListTasksOptions = {}): TaskPage {
    return this.registry.list(ownerId, options);
  }

  cancel(taskId: string, requester: Requester): TaskView {
    const task = this.registry.require(taskId, requester);
    if (isTerminal(task.status)) {
      throw new TaskAlreadyTerminalError(taskId, task.status);
    }

    const previous = task.status;
    this.registry.markCancelled(taskId, this.clock.now().toISOString());
    this.snapshots.save(task);
    logQueueEvent(this.logger, "task.cancelled", { taskId, previous_status: previous });
    this.scheduler.onCancelled(taskId);

    return this.registry.toView(task);
  }

  async delete(taskId: string, requester: Requester): Promise<void> {
    const task = this.registry.require(taskId, requester);
    if (!isTerminal(task.status)) {
      this.cancel(taskId, requester);
    }

    this.registry.remove(taskId);
    this.snapshots.delete(taskId);
    if (task.result_ref) {
      try {
        await this.artifacts.remove(task.result_ref);
      } catch (err) {
        logTaskFailure(this.logger, "task.artifact_remove_failed", taskId, err);
      }
    }
    logQueueEvent(this.logger, "task.deleted", { taskId, status: task.status });
  }

  getResult(taskId: string, requester: Requester): ResultRef {
    const task = this.registry.require(taskId, requester);
    if (task.status !== "completed" || !task.result_ref) {
      throw new TaskNotReadyError(taskId, task.status);
    }
    return { ...task.result_ref };
  }

  stats(): QueueStats {
    const counts = this.registry.counts();
    return {
      pending: counts.pending,
      processing: counts.processing,
      max_concurrent: this.gate.limit,
      available_slots: this.gate.available,
      counts,
    };
  }

  private parseParams(input: unknown): SynthesisParams {
    const parsed = this.paramsSchema.safeParse(input);
    if (parsed.success) return parsed.data;

    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ");
    throw new TaskValidationError(`Invalid synthesis params: ${summary}`, issues);
  }
}
