import { formatErrorMessage } from "./error-format.js";
import { logQueueEvent, type EventLogger } from "./logger.js";
import type { Task } from "./task.js";
import type { TaskRecordStore } from "./task-record-store.js";

type SnapshotOperation = "save" | "delete";

// Serializes writes to the record store so the last transition applied in memory is the last one stored.
// A failed write is logged and never rolls back in-memory state.
export class SnapshotWriter {
  private chain: Promise<void> = Promise.resolve();
  private failures = 0;

  constructor(
    private readonly store: TaskRecordStore,
    private readonly logger: EventLogger,
  ) {}

  get failureCount(): number {
    return this.failures;
  }

  save(task: Task): void {
    const snapshot = structuredClone(task);
    this.enqueue(snapshot.id, "save", () => this.store.saveSnapshot(snapshot));
  }

  delete(taskId: string): void {
    this.enqueue(taskId, "delete", () => this.store.deleteSnapshot(taskId));
  }

  flush(): Promise<void> {
    return this.chain;
  }

  private enqueue(taskId: string, operation: SnapshotOperation, write: () => Promise<void>): void {
    this.chain = this.chain.then(write).catch((err: unknown) => {
      this.failures += 1;
      logQueueEvent(this.logger, "task.persist_failed", {
        taskId,
        operation,
        message: formatErrorMessage(err),
      });
    });
  }
}
