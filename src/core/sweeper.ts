import type { ArtifactStore } from "./artifact-store.js";
import { formatErrorMessage } from "./error-format.js";
import { logQueueEvent, logTaskFailure, type EventLogger } from "./logger.js";
import type { TaskScheduler } from "./scheduler.js";
import type { SnapshotWriter } from "./snapshot-writer.js";
import { isTerminal, type Task } from "./task.js";
import type { TaskRegistry } from "./task-registry.js";
import { elapsedMs, systemClock, type Clock } from "./utils.js";

export type RetentionSweeperOptions = {
  registry: TaskRegistry;
  scheduler: TaskScheduler;
  artifacts: ArtifactStore;
  snapshots: SnapshotWriter;
  logger: EventLogger;
  retentionMs: number;
  taskTimeoutMs: number;
  intervalMs: number;
  clock?: Clock;
};

export type SweepReport = {
  evicted: string[];
  reclaimed: string[];
};

// Evicts expired terminal tasks and reclaims processing tasks that outlived their deadline.
export class RetentionSweeper {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SweepReport> | null = null;
  private readonly clock: Clock;

  constructor(private readonly options: RetentionSweeperOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.runScheduledSweep();
    this.timer = setInterval(() => this.runScheduledSweep(), this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  // Overlapping calls share the pass already running.
  sweep(): Promise<SweepReport> {
    if (!this.inFlight) {
      this.inFlight = this.runSweep().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private runScheduledSweep(): void {
    this.sweep().catch((err: unknown) => {
      logQueueEvent(this.options.logger, "sweep.failed", { message: formatErrorMessage(err) });
    });
  }

  // Decides what the next pass would do without touching anything.
  plan(): SweepReport {
    const now = this.clock.now();
    const report: SweepReport = { evicted: [], reclaimed: [] };

    for (const task of this.options.registry.snapshot()) {
      if (task.status === "processing") {
        if (this.reclaimReason(task, now)) report.reclaimed.push(task.id);
      } else if (isTerminal(task.status) && this.isExpired(task, now)) {
        report.evicted.push(task.id);
      }
    }
    return report;
  }

  private async runSweep(): Promise<SweepReport> {
    const { registry, scheduler, logger } = this.options;
    const now = this.clock.now();
    const report: SweepReport = { evicted: [], reclaimed: [] };

    for (const task of registry.snapshot()) {
      if (task.status === "processing") {
        const reason = this.reclaimReason(task, now);
        if (reason && scheduler.reclaim(task.id, reason)) {
          report.reclaimed.push(task.id);
        }
        continue;
      }

      if (isTerminal(task.status) && this.isExpired(task, now)) {
        await this.evict(task);
        report.evicted.push(task.id);
      }
    }

    logQueueEvent(logger, "sweep.complete", {
      evicted: report.evicted.length,
      reclaimed: report.reclaimed.length,
    });
    return report;
  }

  private reclaimReason(task: Task, now: Date): "timeout" | "interrupted" | null {
    if (!this.options.scheduler.isExecuting(task.id)) {
      return "interrupted";
    }

    const startedAt = task.started_at;
    if (!startedAt) return null;

    const lastActivity = this.options.registry.lastActivityAt(task.id) ?? startedAt;
    const limit = this.options.taskTimeoutMs;
    if (elapsedMs(startedAt, now) > limit && elapsedMs(lastActivity, now) > limit) {
      return "timeout";
    }
    return null;
  }

  private isExpired(task: Task, now: Date): boolean {
    if (!task.completed_at) return false;
    return elapsedMs(task.completed_at, now) > this.options.retentionMs;
  }

  private async evict(task: Task): Promise<void> {
    const { registry, artifacts, snapshots, logger } = this.options;

    // Gone from reads before the artifact is touched.
    registry.remove(task.id);
    if (task.result_ref) {
      try {
        await artifacts.remove(task.result_ref);
      } catch (err) {
        logTaskFailure(logger, "task.artifact_remove_failed", task.id, err);
      }
    }
    snapshots.delete(task.id);
    logQueueEvent(logger, "task.evicted", { taskId: task.id, status: task.status });
  }
}
