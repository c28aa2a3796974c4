/**
 * AppContext wires the queue from a validated config.
 * Purpose: one place that picks the adapters (record store, artifact store, synthesizer, logger)
 * so the CLI and tests build the same object graph.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ config }); await ctx.queue.boot(); ...; await ctx.close().
 */

import { FsArtifactStore } from "../core/artifact-store.js";
import type { QueueConfig, SynthesizerConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { TaskQueue } from "../core/task-queue.js";
import { SqliteTaskRecordStore } from "../core/task-record-store.js";
import { systemClock, type Clock } from "../core/utils.js";
import { CommandSynthesizer } from "../synthesis/command-synthesizer.js";
import { MockSynthesizer } from "../synthesis/mock-synthesizer.js";
import type { Synthesizer } from "../synthesis/synthesizer.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  config: QueueConfig;
  logger: JsonlLogger;
  store: SqliteTaskRecordStore;
  artifacts: FsArtifactStore;
  synthesizer: Synthesizer;
  queue: TaskQueue;
  close: () => Promise<void>;
};

export type CreateAppContextInput = {
  config: QueueConfig;
  component?: string;
  forceMockSynthesizer?: boolean;
  synthesizer?: Synthesizer;
  clock?: Clock;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const { config } = input;

  const logger = new JsonlLogger(config.log_file, { component: input.component ?? "queue" });
  const store = SqliteTaskRecordStore.open(config.database_path);
  const artifacts = new FsArtifactStore(config.output_dir);
  const synthesizer =
    input.synthesizer ??
    createSynthesizer(input.forceMockSynthesizer ? { kind: "mock", delay_ms: 1500 } : config.synthesizer);

  const queue = new TaskQueue({
    config,
    synthesizer,
    store,
    artifacts,
    logger,
    clock: input.clock ?? systemClock,
  });

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;

    try {
      await queue.stop();
    } finally {
      store.close();
      logger.close();
    }
  };

  return { config, logger, store, artifacts, synthesizer, queue, close };
}

export function createSynthesizer(config: SynthesizerConfig): Synthesizer {
  switch (config.kind) {
    case "mock":
      return new MockSynthesizer({ delayMs: config.delay_ms });
    case "command":
      return new CommandSynthesizer({
        command: config.command,
        args: config.args,
        cwd: config.cwd,
      });
  }
}
