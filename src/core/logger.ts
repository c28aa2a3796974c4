import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { QueueError } from "./errors.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export const QUEUE_EVENT_TYPES = [
  "queue.boot",
  "task.submitted",
  "task.started",
  "task.progress",
  "task.completed",
  "task.failed",
  "task.cancelled",
  "task.deleted",
  "task.persist_failed",
  "task.artifact_remove_failed",
  "task.snapshot_invalid",
  "task.reclaimed",
  "task.evicted",
  "task.result_discarded",
  "scheduler.failed",
  "sweep.complete",
  "sweep.failed",
  "http.request",
  "server.listening",
] as const;

export type QueueEventType = (typeof QUEUE_EVENT_TYPES)[number];

export type TaskFailureEventType = Extract<
  QueueEventType,
  "task.persist_failed" | "task.artifact_remove_failed"
>;

/** One line of the event log, as written. */
export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  component?: string;
  task_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  component?: string;
  taskId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type QueueEventFields = JsonObject & { taskId?: string; ts?: string | Date };

export type EventDefaults = {
  component?: string;
  taskId?: string;
};

export type JsonlLoggerOptions = EventDefaults & {
  // Appends the error stack to write warnings. Defaults to the --debug flag.
  debug?: boolean;
};

export type EventLogger = {
  log(event: LogEventInput): void;
};

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Appends queue events to a JSONL file, one fsynced line per event.
 * A failed write is reported on `console.warn` and never thrown to the caller.
 */
export class JsonlLogger implements EventLogger {
  private readonly fd: number;
  private readonly defaults: EventDefaults;
  private readonly debug: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    options: JsonlLoggerOptions = {},
  ) {
    const { debug, ...defaults } = options;
    this.defaults = defaults;
    this.debug = debug ?? resolveDebugFlagFromArgv(process.argv) ?? false;

    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fd, `${JSON.stringify(eventWithTs(event, this.defaults))}\n`);
      fs.fsyncSync(this.fd);
    } catch (err) {
      this.warn(`could not append to event log ${this.filePath}`, err);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    } catch (err) {
      this.warn(`could not close event log ${this.filePath}`, err);
    }
  }

  private warn(action: string, error: unknown): void {
    const message = `Warning: ${action}: ${formatErrorMessage(error)}`;
    const stack = this.debug ? stackOf(error) : undefined;
    console.warn(stack ? `${message}\n${stack}` : message);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { component, taskId, payload, ts, type, ...fields } = event;

  const result: LogEvent = {
    ...fields,
    ts: ts instanceof Date ? ts.toISOString() : (ts ?? isoNow()),
    type,
  };

  const resolvedComponent = component ?? defaults.component;
  if (resolvedComponent) result.component = resolvedComponent;

  const resolvedTaskId = taskId ?? defaults.taskId;
  if (resolvedTaskId) result.task_id = resolvedTaskId;

  if (payload && Object.keys(payload).length > 0) result.payload = payload;

  return result;
}

export function logQueueEvent(
  logger: EventLogger,
  type: QueueEventType,
  fields: QueueEventFields = {},
): void {
  const { taskId, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };
  if (taskId !== undefined) event.taskId = taskId;
  if (ts !== undefined) event.ts = ts;
  logger.log(event);
}

/** Records a side effect that failed for one task without failing the task itself. */
export function logTaskFailure(
  logger: EventLogger,
  type: TaskFailureEventType,
  taskId: string,
  error: unknown,
): void {
  const fields: QueueEventFields = { taskId, message: formatErrorMessage(error) };
  if (error instanceof QueueError) fields.code = error.code;
  logQueueEvent(logger, type, fields);
}

// =============================================================================
// DEBUG FLAG
// =============================================================================

// The last --debug / --no-debug before "--" wins; undefined when neither appears.
export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }
  return debugFlag;
}

function stackOf(error: unknown): string | undefined {
  return formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack")?.text;
}
