import type { TaskStatus } from "./task.js";

export class QueueError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "QueueError";
  }
}

export class ConfigError extends QueueError {
  constructor(
    message: string,
    cause?: unknown,
    public readonly hint?: string,
  ) {
    super(message, "config_invalid", cause);
    this.name = "ConfigError";
  }
}

// =============================================================================
// LOOKUP + OWNERSHIP
// =============================================================================

export class TaskNotFoundError extends QueueError {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found`, "task_not_found");
    this.name = "TaskNotFoundError";
  }
}

export class TaskForbiddenError extends QueueError {
  constructor(
    public readonly taskId: string,
    public readonly requesterId: string,
  ) {
    super(`Requester ${requesterId} may not access task ${taskId}`, "task_forbidden");
    this.name = "TaskForbiddenError";
  }
}

export class TaskAlreadyTerminalError extends QueueError {
  constructor(
    public readonly taskId: string,
    public readonly status: TaskStatus,
  ) {
    super(`Task ${taskId} is already ${status}`, "task_already_terminal");
    this.name = "TaskAlreadyTerminalError";
  }
}

export class TaskNotReadyError extends QueueError {
  constructor(
    public readonly taskId: string,
    public readonly status: TaskStatus,
  ) {
    super(`Task ${taskId} is not completed yet (status: ${status})`, "task_not_ready");
    this.name = "TaskNotReadyError";
  }
}

export class TaskTransitionError extends QueueError {
  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus,
  ) {
    super(`Cannot move task ${taskId} from ${from} to ${to}`, "task_transition_invalid");
    this.name = "TaskTransitionError";
  }
}

// =============================================================================
// EXECUTION
// =============================================================================

export class SynthesisError extends QueueError {
  constructor(message: string, cause?: unknown) {
    super(message, "synthesis_failed", cause);
    this.name = "SynthesisError";
  }
}

export class TaskTimeoutError extends QueueError {
  constructor(
    public readonly taskId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Task ${taskId} exceeded the ${timeoutMs / 1000}s execution timeout`, "timeout");
    this.name = "TaskTimeoutError";
  }
}

export class TaskCancelledError extends QueueError {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} was cancelled`, "task_cancelled");
    this.name = "TaskCancelledError";
  }
}

export class GateClosedError extends QueueError {
  constructor(reason = "Admission gate is closed") {
    super(reason, "gate_closed");
    this.name = "GateClosedError";
  }
}

export class TaskValidationError extends QueueError {
  constructor(
    message: string,
    public readonly issues: { path: string; message: string }[],
  ) {
    super(message, "invalid_params");
    this.name = "TaskValidationError";
  }
}
