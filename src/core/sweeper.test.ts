import { describe, expect, it, vi } from "vitest";

import {
  audioBytes,
  DeferredSynthesizer,
  FakeTaskRecordStore,
  ManualClock,
  MemoryArtifactStore,
  RecordingLogger,
} from "./__tests__/fakes.js";
import { AdmissionGate } from "./admission-gate.js";
import { TaskScheduler } from "./scheduler.js";
import { SnapshotWriter } from "./snapshot-writer.js";
import { RetentionSweeper } from "./sweeper.js";
import { createTask, markTaskProcessing, SynthesisParamsSchema } from "./task.js";
import { TaskRegistry } from "./task-registry.js";

const params = SynthesisParamsSchema.parse({ text: "hello", prompt_audio: "voice.wav" });

const TIMEOUT_MS = 300_000;
const RETENTION_MS = 3_600_000;

function setup(limit = 1) {
  const clock = new ManualClock("2026-01-01T00:00:00.000Z");
  const registry = new TaskRegistry();
  const gate = new AdmissionGate(limit);
  const synthesizer = new DeferredSynthesizer();
  const artifacts = new MemoryArtifactStore();
  const store = new FakeTaskRecordStore();
  const logger = new RecordingLogger();
  const snapshots = new SnapshotWriter(store, logger);

  const scheduler = new TaskScheduler({
    registry,
    gate,
    synthesizer,
    artifacts,
    snapshots,
    logger,
    taskTimeoutMs: TIMEOUT_MS,
    clock,
  });
  const sweeper = new RetentionSweeper({
    registry,
    scheduler,
    artifacts,
    snapshots,
    logger,
    retentionMs: RETENTION_MS,
    taskTimeoutMs: TIMEOUT_MS,
    intervalMs: 600_000,
    clock,
  });

  const submit = (id: string): void => {
    registry.insert(createTask({ id, ownerId: "alice", params, now: clock.now().toISOString() }));
    scheduler.notify();
  };

  return { clock, registry, gate, synthesizer, artifacts, store, logger, snapshots, scheduler, sweeper, submit };
}

describe("RetentionSweeper", () => {
  it("evicts terminal tasks past the retention window with their artifact and snapshot", async () => {
    const ctx = setup();
    ctx.scheduler.start();
    ctx.submit("old");

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    ctx.synthesizer.call("old").resolve(audioBytes());
    await vi.waitFor(() => expect(ctx.registry.peek("old")?.status).toBe("completed"));

    ctx.clock.advanceSeconds(1800);
    ctx.submit("young");
    ctx.registry.markCancelled("young", ctx.clock.now().toISOString());

    ctx.clock.advanceSeconds(1801);
    const report = await ctx.sweeper.sweep();
    await ctx.snapshots.flush();

    expect(report).toEqual({ evicted: ["old"], reclaimed: [] });
    expect(ctx.registry.peek("old")).toBeUndefined();
    expect(ctx.registry.peek("young")?.status).toBe("cancelled");
    expect(ctx.artifacts.removed).toEqual(["/outputs/old.wav"]);
    expect(ctx.store.snapshots.has("old")).toBe(false);
    expect(ctx.logger.ofType("sweep.complete")).toEqual([
      { type: "sweep.complete", evicted: 1, reclaimed: 0 },
    ]);

    await ctx.scheduler.stop();
  });

  it("fails a task stuck past the timeout and makes its slot reusable", async () => {
    const ctx = setup(1);
    ctx.scheduler.start();
    ctx.submit("stuck");
    ctx.submit("waiting");

    await vi.waitFor(() => expect(ctx.registry.peek("stuck")?.status).toBe("processing"));

    ctx.clock.advanceSeconds(299);
    expect((await ctx.sweeper.sweep()).reclaimed).toEqual([]);

    ctx.clock.advanceSeconds(2);
    const report = await ctx.sweeper.sweep();

    expect(report.reclaimed).toEqual(["stuck"]);
    expect(ctx.registry.peek("stuck")?.error?.code).toBe("timeout");
    await vi.waitFor(() => expect(ctx.registry.peek("waiting")?.status).toBe("processing"));
    expect(ctx.gate.held).toBe(1);

    await ctx.scheduler.stop();
  });

  it("leaves a long task alone while it keeps reporting progress", async () => {
    const ctx = setup(1);
    ctx.scheduler.start();
    ctx.submit("busy");

    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    ctx.clock.advanceSeconds(250);
    ctx.synthesizer.call("busy").context.onProgress(0.5);
    ctx.clock.advanceSeconds(100);

    expect((await ctx.sweeper.sweep()).reclaimed).toEqual([]);
    expect(ctx.registry.peek("busy")?.status).toBe("processing");

    await ctx.scheduler.stop();
  });

  it("fails processing tasks that have no live execution as interrupted", async () => {
    const ctx = setup();
    const orphan = createTask({ id: "orphan", ownerId: "alice", params, now: "2026-01-01T00:00:00.000Z" });
    markTaskProcessing(orphan, "2026-01-01T00:00:00.000Z");
    ctx.registry.hydrate([orphan]);

    const report = await ctx.sweeper.sweep();

    expect(report.reclaimed).toEqual(["orphan"]);
    expect(ctx.registry.peek("orphan")?.error?.code).toBe("interrupted");
    expect(ctx.gate.held).toBe(0);
  });

  it("plans a pass without changing anything", async () => {
    const ctx = setup();
    ctx.submit("t1");
    ctx.registry.markCancelled("t1", ctx.clock.now().toISOString());
    ctx.clock.advanceSeconds(3601);

    expect(ctx.sweeper.plan()).toEqual({ evicted: ["t1"], reclaimed: [] });
    expect(ctx.registry.peek("t1")?.status).toBe("cancelled");
    expect(ctx.logger.ofType("sweep.complete")).toHaveLength(0);
  });

  it("keeps evicting when an artifact cannot be removed", async () => {
    const ctx = setup();
    ctx.scheduler.start();
    ctx.submit("t1");
    await vi.waitFor(() => expect(ctx.synthesizer.callCount).toBe(1));
    ctx.synthesizer.call("t1").resolve(audioBytes());
    await vi.waitFor(() => expect(ctx.registry.peek("t1")?.status).toBe("completed"));

    vi.spyOn(ctx.artifacts, "remove").mockRejectedValue(new Error("permission denied"));
    ctx.clock.advanceSeconds(3601);
    const report = await ctx.sweeper.sweep();

    expect(report.evicted).toEqual(["t1"]);
    expect(ctx.registry.peek("t1")).toBeUndefined();
    expect(ctx.logger.ofType("task.artifact_remove_failed")).toEqual([
      { type: "task.artifact_remove_failed", taskId: "t1", message: "permission denied" },
    ]);

    await ctx.scheduler.stop();
  });

  it("runs a first pass on start and stops its timer", async () => {
    const ctx = setup();
    ctx.sweeper.start();
    expect(ctx.sweeper.running).toBe(true);

    await vi.waitFor(() => expect(ctx.logger.ofType("sweep.complete")).toHaveLength(1));
    await ctx.sweeper.stop();
    expect(ctx.sweeper.running).toBe(false);
  });
});
