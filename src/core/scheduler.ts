/**
 * TaskScheduler runs the dispatch loop and the worker executions.
 * Purpose: admit pending tasks in FIFO order through the admission gate, drive each
 * admitted task through synthesis under a deadline, and record the outcome.
 * Assumptions: the registry is authoritative; snapshots are best-effort.
 * Usage: scheduler.start(); scheduler.notify() after each submit; await scheduler.stop().
 */

import type { Synthesizer } from "../synthesis/synthesizer.js";

import type { AdmissionGate, Permit } from "./admission-gate.js";
import type { ArtifactStore } from "./artifact-store.js";
import { formatErrorMessage } from "./error-format.js";
import { GateClosedError, QueueError, TaskCancelledError, TaskTimeoutError } from "./errors.js";
import { logQueueEvent, logTaskFailure, type EventLogger } from "./logger.js";
import type { SnapshotWriter } from "./snapshot-writer.js";
import type { ResultRef, Task, TaskErrorInfo } from "./task.js";
import type { TaskRegistry } from "./task-registry.js";
import { systemClock, type Clock } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskSchedulerOptions = {
  registry: TaskRegistry;
  gate: AdmissionGate;
  synthesizer: Synthesizer;
  artifacts: ArtifactStore;
  snapshots: SnapshotWriter;
  logger: EventLogger;
  taskTimeoutMs: number;
  clock?: Clock;
};

export type ReclaimReason = "timeout" | "interrupted";

type Interrupt = {
  promise: Promise<never>;
  trigger: (reason: unknown) => void;
};

type Execution = {
  taskId: string;
  controller: AbortController;
  permit: Permit;
  interrupt: Interrupt;
  done: Promise<void>;
};

export class SchedulerShutdownError extends QueueError {
  constructor() {
    super("Task queue is shutting down", "shutdown");
    this.name = "SchedulerShutdownError";
  }
}

// =============================================================================
// SCHEDULER
// =============================================================================

export class TaskScheduler {
  private readonly registry: TaskRegistry;
  private readonly gate: AdmissionGate;
  private readonly synthesizer: Synthesizer;
  private readonly artifacts: ArtifactStore;
  private readonly snapshots: SnapshotWriter;
  private readonly logger: EventLogger;
  private readonly taskTimeoutMs: number;
  private readonly clock: Clock;

  // One controller per task from submission until it leaves `processing`.
  private readonly controllers = new Map<string, AbortController>();
  private readonly executions = new Map<string, Execution>();
  private wake: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private stopping = false;

  constructor(options: TaskSchedulerOptions) {
    this.registry = options.registry;
    this.gate = options.gate;
    this.synthesizer = options.synthesizer;
    this.artifacts = options.artifacts;
    this.snapshots = options.snapshots;
    this.logger = options.logger;
    this.taskTimeoutMs = options.taskTimeoutMs;
    this.clock = options.clock ?? systemClock;
  }

  get running(): boolean {
    return this.loop !== null && !this.stopping;
  }

  get activeCount(): number {
    return this.executions.size;
  }

  start(): void {
    if (this.loop || this.stopping) return;

    this.loop = this.runDispatchLoop().catch((err: unknown) => {
      logQueueEvent(this.logger, "scheduler.failed", { message: formatErrorMessage(err) });
    });
  }

  notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  isExecuting(taskId: string): boolean {
    return this.executions.has(taskId);
  }

  // Called after the registry has moved the task to `cancelled`.
  onCancelled(taskId: string): void {
    const controller = this.controllers.get(taskId);
    if (!controller || controller.signal.aborted) return;

    controller.abort(new TaskCancelledError(taskId));
    this.notify();
  }

  // Force-fails a processing task and frees its slot even if the worker never returns.
  reclaim(taskId: string, reason: ReclaimReason): boolean {
    const task = this.registry.peek(taskId);
    if (!task || task.status !== "processing") return false;

    const error: TaskErrorInfo =
      reason === "timeout"
        ? { code: "timeout", message: new TaskTimeoutError(taskId, this.taskTimeoutMs).message }
        : { code: "interrupted", message: "Execution was interrupted before it finished" };

    this.registry.markFailed(taskId, error, this.isoNow());
    this.snapshots.save(task);
    logQueueEvent(this.logger, "task.reclaimed", { taskId, reason });

    const execution = this.executions.get(taskId);
    if (execution) {
      const abortReason = new TaskTimeoutError(taskId, this.taskTimeoutMs);
      execution.controller.abort(abortReason);
      execution.interrupt.trigger(abortReason);
      execution.permit.release();
    }
    this.controllers.delete(taskId);
    return true;
  }

  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    this.gate.close("Task queue is shutting down");
    this.notify();
    await this.loop;

    const inFlight = [...this.executions.values()];
    for (const execution of inFlight) {
      const reason = new SchedulerShutdownError();
      execution.controller.abort(reason);
      execution.interrupt.trigger(reason);
    }
    await Promise.all(inFlight.map((execution) => execution.done));
  }

  // =============================================================================
  // DISPATCH LOOP
  // =============================================================================

  private async runDispatchLoop(): Promise<void> {
    while (!this.stopping) {
      const head = this.registry.oldestPending();
      if (!head) {
        await this.waitForWork();
        continue;
      }

      const controller = this.controllerFor(head.id);
      let permit: Permit;
      try {
        permit = await this.gate.acquire(controller.signal);
      } catch (err) {
        if (err instanceof GateClosedError || this.stopping) return;
        // The head was cancelled while waiting; no slot was consumed.
        this.controllers.delete(head.id);
        continue;
      }

      if (this.registry.peek(head.id)?.status !== "pending") {
        this.controllers.delete(head.id);
      }
      if (this.stopping) {
        permit.release();
        return;
      }

      // A task submitted during the wait may now sort ahead of the one observed before it.
      const next = this.registry.oldestPending();
      if (!next) {
        permit.release();
        continue;
      }

      this.dispatch(next, permit, this.controllerFor(next.id));
    }
  }

  private waitForWork(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
    });
  }

  private controllerFor(taskId: string): AbortController {
    const existing = this.controllers.get(taskId);
    if (existing) return existing;

    const controller = new AbortController();
    this.controllers.set(taskId, controller);
    return controller;
  }

  private dispatch(task: Task, permit: Permit, controller: AbortController): void {
    this.registry.markProcessing(task.id, this.isoNow());
    this.snapshots.save(task);
    logQueueEvent(this.logger, "task.started", { taskId: task.id, permit: permit.id });

    const execution: Execution = {
      taskId: task.id,
      controller,
      permit,
      interrupt: createInterrupt(),
      done: Promise.resolve(),
    };
    this.executions.set(task.id, execution);
    execution.done = this.execute(task, execution);
  }

  // =============================================================================
  // WORKER
  // =============================================================================

  private async execute(task: Task, execution: Execution): Promise<void> {
    const { controller, interrupt, permit } = execution;
    const taskId = task.id;

    // Cancellation only aborts the signal; the deadline also stops waiting on the synthesizer.
    const deadline = setTimeout(() => {
      const reason = new TaskTimeoutError(taskId, this.taskTimeoutMs);
      controller.abort(reason);
      interrupt.trigger(reason);
    }, this.taskTimeoutMs);

    try {
      const synthesis = this.synthesizer.synthesize(
        { taskId, params: task.params },
        {
          signal: controller.signal,
          onProgress: (fraction, message) =>
            this.reportProgress(taskId, controller.signal, fraction, message),
        },
      );
      const audio = await Promise.race([synthesis, interrupt.promise]);
      await this.complete(taskId, audio);
    } catch (err) {
      this.fail(taskId, controller.signal.aborted ? controller.signal.reason : err);
    } finally {
      clearTimeout(deadline);
      permit.release();
      this.executions.delete(taskId);
      this.controllers.delete(taskId);
      this.notify();
    }
  }

  private reportProgress(
    taskId: string,
    signal: AbortSignal,
    fraction: number,
    message?: string,
  ): void {
    if (signal.aborted) {
      throw signal.reason;
    }

    if (this.registry.markProgress(taskId, fraction, message, this.isoNow())) {
      const task = this.registry.peek(taskId);
      if (!task) return;
      this.snapshots.save(task);
      logQueueEvent(this.logger, "task.progress", {
        taskId,
        progress: task.progress,
        message: task.message,
      });
    }
  }

  private async complete(taskId: string, audio: Uint8Array): Promise<void> {
    if (!this.isStillProcessing(taskId)) {
      logQueueEvent(this.logger, "task.result_discarded", { taskId });
      return;
    }

    let resultRef: ResultRef;
    try {
      resultRef = await this.artifacts.save(taskId, audio);
    } catch (err) {
      this.recordFailure(taskId, { code: "artifact_failed", message: formatErrorMessage(err) });
      return;
    }

    // Cancelled or reclaimed while the artifact was being written.
    if (!this.isStillProcessing(taskId)) {
      await this.artifacts.remove(resultRef).catch((err: unknown) => {
        logTaskFailure(this.logger, "task.artifact_remove_failed", taskId, err);
      });
      logQueueEvent(this.logger, "task.result_discarded", { taskId });
      return;
    }

    const task = this.registry.markCompleted(taskId, resultRef, this.isoNow());
    this.snapshots.save(task);
    logQueueEvent(this.logger, "task.completed", {
      taskId,
      size_bytes: resultRef.size_bytes,
    });
  }

  private fail(taskId: string, cause: unknown): void {
    if (!this.isStillProcessing(taskId)) {
      logQueueEvent(this.logger, "task.result_discarded", {
        taskId,
        message: formatErrorMessage(cause),
      });
      return;
    }

    this.recordFailure(taskId, toTaskErrorInfo(cause));
  }

  private recordFailure(taskId: string, error: TaskErrorInfo): void {
    const task = this.registry.markFailed(taskId, error, this.isoNow());
    this.snapshots.save(task);
    logQueueEvent(this.logger, "task.failed", { taskId, code: error.code, message: error.message });
  }

  private isStillProcessing(taskId: string): boolean {
    return this.registry.peek(taskId)?.status === "processing";
  }

  private isoNow(): string {
    return this.clock.now().toISOString();
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function toTaskErrorInfo(cause: unknown): TaskErrorInfo {
  if (cause instanceof TaskTimeoutError) {
    return { code: "timeout", message: cause.message };
  }
  if (cause instanceof SchedulerShutdownError) {
    return { code: "interrupted", message: cause.message };
  }
  return { code: "synthesis_failed", message: formatErrorMessage(cause) };
}

function createInterrupt(): Interrupt {
  let trigger: (reason: unknown) => void = () => undefined;
  const promise = new Promise<never>((_resolve, reject) => {
    trigger = reject;
  });
  return { promise, trigger };
}
