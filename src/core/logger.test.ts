import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { QueueError } from "./errors.js";
import {
  JsonlLogger,
  eventWithTs,
  logQueueEvent,
  logTaskFailure,
  resolveDebugFlagFromArgv,
} from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function tempLogPath(...segments: string[]): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  return path.join(tmpDir, ...segments);
}

function readEvents(logPath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with component and task metadata", () => {
    const logPath = tempLogPath("nested", "queue.jsonl");
    const logger = new JsonlLogger(logPath, { component: "queue", taskId: "task-9" });

    logger.log({ type: "task.started", payload: { permit: 1 } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);

    const [event] = events;
    expect(event?.type).toBe("task.started");
    expect(event?.component).toBe("queue");
    expect(event?.task_id).toBe("task-9");
    expect(event?.payload).toEqual({ permit: 1 });
    expect(new Date(String(event?.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = tempLogPath("queue.jsonl");
    const logger = new JsonlLogger(logPath);

    logger.log({ type: "first", payload: { order: 1 } });
    logger.log({ type: "second", payload: { order: 2 } });
    logger.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("ignores writes after close", () => {
    const logPath = tempLogPath("queue.jsonl");
    const logger = new JsonlLogger(logPath);

    logger.log({ type: "before" });
    logger.close();
    logger.log({ type: "after" });

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["before"]);
  });

  it("logs queue helpers with top-level fields", () => {
    const logPath = tempLogPath("queue.jsonl");
    const logger = new JsonlLogger(logPath, { component: "queue" });

    logQueueEvent(logger, "task.completed", { taskId: "t-1", size_bytes: 44 });
    logTaskFailure(logger, "task.persist_failed", "t-2", new Error("disk full"));
    logger.close();

    const [completed, failed] = readEvents(logPath);
    expect(completed?.type).toBe("task.completed");
    expect(completed?.task_id).toBe("t-1");
    expect(completed?.size_bytes).toBe(44);
    expect(completed).not.toHaveProperty("taskId");
    expect(failed?.type).toBe("task.persist_failed");
    expect(failed?.task_id).toBe("t-2");
    expect(failed?.message).toBe("disk full");
    expect(failed).not.toHaveProperty("code");
  });

  it("adds the queue error code to task failure events", () => {
    const logPath = tempLogPath("queue.jsonl");
    const logger = new JsonlLogger(logPath);

    logTaskFailure(logger, "task.persist_failed", "t-3", new QueueError("Store is closed", "store_closed"));
    logger.close();

    const [event] = readEvents(logPath);
    expect(event?.message).toBe("Store is closed");
    expect(event?.code).toBe("store_closed");
    expect(event?.task_id).toBe("t-3");
  });

  it("warns on write failures with formatted messages", () => {
    const logPath = tempLogPath("queue.jsonl");
    const logger = new JsonlLogger(logPath);

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.started" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: could not append to event log ${logPath}: disk full`,
    );
  });

  it("includes the stack when constructed with debug", () => {
    const logPath = tempLogPath("queue.jsonl");
    const logger = new JsonlLogger(logPath, { component: "queue", debug: true });

    const closeError = new Error("bad descriptor");
    closeError.stack = "Error: bad descriptor\n    at close (fake:1:1)";
    vi.spyOn(fs, "closeSync").mockImplementation(() => {
      throw closeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.close();

    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      [
        `Warning: could not close event log ${logPath}: bad descriptor`,
        "Error: bad descriptor",
        "    at close (fake:1:1)",
      ].join("\n"),
    );
  });

  it("includes stack details when debug is enabled", () => {
    const originalArgv = [...process.argv];
    process.argv = [...process.argv, "--debug"];

    try {
      const logPath = tempLogPath("queue.jsonl");
      const logger = new JsonlLogger(logPath);

      const writeError = new Error("disk full");
      vi.spyOn(fs, "writeSync").mockImplementation(() => {
        throw writeError;
      });
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      logger.log({ type: "task.started" });
      logger.close();

      expect(warnSpy).toHaveBeenCalledTimes(1);
      const message = warnSpy.mock.calls[0]?.[0];
      expect(message).toContain("disk full");
      if (writeError.stack) {
        expect(message).toContain(writeError.stack);
      }
    } finally {
      process.argv = originalArgv;
    }
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, taskId: "t-1" },
      { component: "http" },
    );

    expect(event.component).toBe("http");
    expect(event.task_id).toBe("t-1");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
    expect(new Date(event.ts).toString()).not.toBe("Invalid Date");
  });

  it("keeps a provided timestamp and drops an empty payload", () => {
    const event = eventWithTs({
      type: "sample",
      ts: new Date("2026-01-01T00:00:00.000Z"),
      payload: {},
    });

    expect(event).toEqual({ type: "sample", ts: "2026-01-01T00:00:00.000Z" });
  });
});

describe("resolveDebugFlagFromArgv", () => {
  it("takes the last debug flag before the option terminator", () => {
    expect(resolveDebugFlagFromArgv(["node", "cli", "--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["node", "cli", "--no-debug", "--debug"])).toBe(true);
    expect(resolveDebugFlagFromArgv(["node", "cli", "--", "--debug"])).toBeUndefined();
  });
});
