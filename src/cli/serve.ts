/*
 * `speech-queue serve`: boot the queue from its record store, then expose it over HTTP.
 * Assumptions: a single process owns the database file and the output directory.
 */

import { createAppContext } from "../app/context.js";
import type { QueueConfig } from "../core/config.js";
import { logQueueEvent } from "../core/logger.js";
import { startApiServer } from "../http/server.js";
import { isMockSynthesisEnabled } from "../synthesis/mock-synthesizer.js";

import { createStopSignalHandler, waitForAbort } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

export type ServeCommandOptions = {
  host?: string;
  port?: number;
  mock?: boolean;
};

// =============================================================================
// SERVE COMMAND
// =============================================================================

export async function serveCommand(config: QueueConfig, opts: ServeCommandOptions): Promise<void> {
  const ctx = createAppContext({
    config,
    component: "server",
    forceMockSynthesizer: opts.mock === true || isMockSynthesisEnabled(),
  });

  const stopHandler = createStopSignalHandler({
    onSignal: (signal) => {
      console.log(`Received ${signal}. Draining in-flight tasks and shutting down.`);
    },
  });

  try {
    const boot = await ctx.queue.boot();
    if (boot.orphaned.length > 0) {
      console.log(`Found ${boot.orphaned.length} task(s) interrupted by the previous shutdown.`);
    }
    ctx.queue.start();

    const host = opts.host ?? config.host;
    const port = opts.port ?? config.port;
    const server = await startApiServer({ queue: ctx.queue, logger: ctx.logger, host, port });
    logQueueEvent(ctx.logger, "server.listening", { url: server.url, host, port: server.port });
    console.log(`speech-queue listening at ${server.url} (max ${ctx.queue.maxConcurrent} concurrent)`);

    try {
      await waitForAbort(stopHandler.signal);
    } finally {
      await server.close();
    }
  } finally {
    stopHandler.cleanup();
    await ctx.close();
  }
}
