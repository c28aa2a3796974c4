import { describe, expect, it, vi } from "vitest";

import {
  AbortAwareSynthesizer,
  audioBytes,
  DeferredSynthesizer,
  FakeTaskRecordStore,
  MemoryArtifactStore,
  RecordingLogger,
  TickingClock,
} from "./__tests__/fakes.js";
import { AdmissionGate } from "./admission-gate.js";
import { TaskCancelledError, TaskTimeoutError } from "./errors.js";
import { SchedulerShutdownError, TaskScheduler, toTaskErrorInfo } from "./scheduler.js";
import { SnapshotWriter } from "./snapshot-writer.js";
import { createTask, SynthesisParamsSchema } from "./task.js";
import { TaskRegistry } from "./task-registry.js";

const params = SynthesisParamsSchema.parse({ text: "hello", prompt_audio: "voice.wav" });

function setup(options: { limit?: number; timeoutMs?: number; synthesizer?: DeferredSynthesizer } = {}) {
  const registry = new TaskRegistry();
  const gate = new AdmissionGate(options.limit ?? 2);
  const synthesizer = options.synthesizer ?? new DeferredSynthesizer();
  const artifacts = new MemoryArtifactStore();
  const store = new FakeTaskRecordStore();
  const logger = new RecordingLogger();
  const clock = new TickingClock();
  const snapshots = new SnapshotWriter(store, logger);

  const scheduler = new TaskScheduler({
    registry,
    gate,
    synthesizer,
    artifacts,
    snapshots,
    logger,
    taskTimeoutMs: options.timeoutMs ?? 60_000,
    clock,
  });

  const submit = (id: string): void => {
    registry.insert(createTask({ id, ownerId: "alice", params, now: clock.now().toISOString() }));
    scheduler.notify();
  };

  const status = (id: string): string | undefined => registry.peek(id)?.status;

  return { registry, gate, synthesizer, artifacts, store, logger, snapshots, scheduler, submit, status };
}

describe("TaskScheduler", () => {
  it("never runs more tasks than the gate allows and admits in FIFO order", async () => {
    const ctx = setup({ limit: 2 });
    ctx.scheduler.start();
    for (const id of ["t1", "t2", "t3", "t4"]) ctx.submit(id);

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(2));
    expect(ctx.synthesizer.calls.map((call) => call.request.taskId)).toEqual(["t1", "t2"]);
    expect(ctx.registry.pendingIds()).toEqual(["t3", "t4"]);
    expect(ctx.gate.held).toBe(2);

    ctx.synthesizer.call("t2").resolve(audioBytes());
    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(3));

    expect(ctx.status("t2")).toBe("completed");
    expect(ctx.synthesizer.calls[2]?.request.taskId).toBe("t3");
    expect(ctx.registry.counts().processing).toBe(2);

    await ctx.scheduler.stop();
  });

  it("admits the task that sorts first once a slot frees, not the head seen before the wait", async () => {
    const ctx = setup({ limit: 1 });
    const insertAt = (id: string, now: string): void => {
      ctx.registry.insert(createTask({ id, ownerId: "alice", params, now }));
      ctx.scheduler.notify();
    };
    ctx.scheduler.start();

    insertAt("x", "2026-01-01T00:00:00.000Z");
    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));

    insertAt("m", "2026-01-01T00:00:01.000Z");
    await vi.waitFor(() => expect(ctx.gate.waiting).toBe(1));
    insertAt("c", "2026-01-01T00:00:01.000Z");
    expect(ctx.registry.pendingIds()).toEqual(["c", "m"]);

    ctx.synthesizer.call("x").resolve(audioBytes());
    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(2));
    expect(ctx.synthesizer.calls[1]?.request.taskId).toBe("c");
    expect(ctx.status("m")).toBe("pending");

    ctx.synthesizer.call("c").resolve(audioBytes());
    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(3));
    expect(ctx.synthesizer.calls[2]?.request.taskId).toBe("m");

    await ctx.scheduler.stop();
  });

  it("records progress and stores the artifact on success", async () => {
    const ctx = setup();
    ctx.scheduler.start();
    ctx.submit("t1");

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    const call = ctx.synthesizer.call("t1");
    expect(call.request.params.text).toBe("hello");

    call.context.onProgress(0.25, "Encoding text");
    expect(ctx.registry.peek("t1")?.progress).toBe(0.25);
    expect(ctx.registry.peek("t1")?.message).toBe("Encoding text");

    call.resolve(audioBytes(12));
    await vi.waitFor(() => expect(ctx.status("t1")).toBe("completed"));

    const task = ctx.registry.peek("t1");
    expect(task?.progress).toBe(1);
    expect(task?.result_ref).toEqual({ path: "/outputs/t1.wav", size_bytes: 12, media_type: "audio/wav" });
    expect(ctx.gate.held).toBe(0);

    await ctx.snapshots.flush();
    expect(ctx.store.snapshots.get("t1")?.status).toBe("completed");
    expect(ctx.logger.types()).toContain("task.completed");

    await ctx.scheduler.stop();
  });

  it("fails the task when synthesis rejects", async () => {
    const ctx = setup();
    ctx.scheduler.start();
    ctx.submit("t1");

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    ctx.synthesizer.call("t1").reject(new Error("model crashed"));

    await vi.waitFor(() => expect(ctx.status("t1")).toBe("failed"));
    expect(ctx.registry.peek("t1")?.error).toEqual({
      code: "synthesis_failed",
      message: "model crashed",
    });
    expect(ctx.gate.held).toBe(0);

    await ctx.scheduler.stop();
  });

  it("fails with a timeout and frees the slot when synthesis overruns its deadline", async () => {
    const ctx = setup({ limit: 1, timeoutMs: 20 });
    ctx.scheduler.start();
    ctx.submit("slow");
    ctx.submit("next");

    await vi.waitFor(() => expect(ctx.status("slow")).toBe("failed"));
    expect(ctx.registry.peek("slow")?.error?.code).toBe("timeout");
    expect(ctx.synthesizer.call("slow").context.signal.aborted).toBe(true);

    // The freed slot goes to the next task.
    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(2));
    expect(ctx.synthesizer.calls[1]?.request.taskId).toBe("next");

    await ctx.scheduler.stop();
  });

  it("discards the result of a task cancelled mid-synthesis", async () => {
    const ctx = setup({ limit: 1 });
    ctx.scheduler.start();
    ctx.submit("t1");
    ctx.submit("t2");

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    const call = ctx.synthesizer.call("t1");

    ctx.registry.markCancelled("t1");
    ctx.scheduler.onCancelled("t1");

    expect(call.context.signal.aborted).toBe(true);
    expect(call.context.signal.reason).toBeInstanceOf(TaskCancelledError);
    expect(() => call.context.onProgress(0.5)).toThrow(TaskCancelledError);
    // The slot stays held until the synthesizer settles.
    expect(ctx.gate.held).toBe(1);

    call.resolve(audioBytes());
    await vi.waitFor(() => expect(ctx.status("t2")).toBe("processing"));

    expect(ctx.status("t1")).toBe("cancelled");
    expect(ctx.artifacts.files.size).toBe(0);
    expect(ctx.logger.ofType("task.result_discarded")).toHaveLength(1);

    await ctx.scheduler.stop();
  });

  it("abandons the admission wait of a cancelled head task", async () => {
    const ctx = setup({ limit: 1 });
    ctx.scheduler.start();
    ctx.submit("running");
    ctx.submit("head");
    ctx.submit("after");

    await vi.waitFor(() => expect(ctx.gate.waiting).toBe(1));

    ctx.registry.markCancelled("head");
    ctx.scheduler.onCancelled("head");
    ctx.synthesizer.call("running").resolve(audioBytes());

    await vi.waitFor(() => expect(ctx.status("after")).toBe("processing"));
    expect(ctx.synthesizer.calls.map((call) => call.request.taskId)).toEqual(["running", "after"]);
    expect(ctx.gate.held).toBe(1);

    await ctx.scheduler.stop();
  });

  it("fails with artifact_failed when the audio cannot be stored", async () => {
    const ctx = setup();
    ctx.artifacts.failSaves = true;
    ctx.scheduler.start();
    ctx.submit("t1");

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    ctx.synthesizer.call("t1").resolve(audioBytes());

    await vi.waitFor(() => expect(ctx.status("t1")).toBe("failed"));
    expect(ctx.registry.peek("t1")?.error).toEqual({
      code: "artifact_failed",
      message: "output directory is read-only",
    });

    await ctx.scheduler.stop();
  });

  it("reclaims a stuck task and lets the next one run", async () => {
    const ctx = setup({ limit: 1 });
    ctx.scheduler.start();
    ctx.submit("stuck");
    ctx.submit("next");

    await vi.waitFor(() => expect(ctx.status("stuck")).toBe("processing"));
    expect(ctx.scheduler.isExecuting("stuck")).toBe(true);

    expect(ctx.scheduler.reclaim("stuck", "timeout")).toBe(true);
    expect(ctx.status("stuck")).toBe("failed");
    expect(ctx.registry.peek("stuck")?.error?.code).toBe("timeout");
    expect(ctx.scheduler.reclaim("stuck", "timeout")).toBe(false);

    await vi.waitFor(() => expect(ctx.status("next")).toBe("processing"));
    expect(ctx.gate.held).toBe(1);

    await ctx.scheduler.stop();
  });

  it("interrupts in-flight work on stop and leaves pending tasks queued", async () => {
    const ctx = setup({ limit: 1, synthesizer: new AbortAwareSynthesizer() });
    ctx.scheduler.start();
    ctx.submit("t1");
    ctx.submit("t2");

    await vi.waitFor(() => expect(ctx.status("t1")).toBe("processing"));
    await ctx.scheduler.stop();

    expect(ctx.status("t1")).toBe("failed");
    expect(ctx.registry.peek("t1")?.error?.code).toBe("interrupted");
    expect(ctx.status("t2")).toBe("pending");
    expect(ctx.scheduler.running).toBe(false);
  });
});

describe("toTaskErrorInfo", () => {
  it("maps stop reasons to task error codes", () => {
    expect(toTaskErrorInfo(new TaskTimeoutError("t1", 300_000))).toEqual({
      code: "timeout",
      message: "Task t1 exceeded the 300s execution timeout",
    });
    expect(toTaskErrorInfo(new SchedulerShutdownError()).code).toBe("interrupted");
    expect(toTaskErrorInfo("boom")).toEqual({ code: "synthesis_failed", message: "boom" });
  });
});
