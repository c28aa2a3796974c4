import http from "node:http";

import type { EventLogger } from "../core/logger.js";
import type { TaskQueue } from "../core/task-queue.js";

import { createApiRouter } from "./router.js";

// =============================================================================
// TYPES
// =============================================================================

export type StartApiServerOptions = {
  queue: TaskQueue;
  logger: EventLogger;
  host?: string;
  port?: number;
  // Upper bound for JSON request bodies; the router default applies when unset.
  maxBodyBytes?: number;
};

export type ApiServerHandle = {
  url: string;
  port: number;
  close: () => Promise<void>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function startApiServer(options: StartApiServerOptions): Promise<ApiServerHandle> {
  const port = options.port ?? 0;
  if (!Number.isInteger(port) || port < 0) {
    throw new Error("Port must be a non-negative integer.");
  }
  const host = options.host ?? "127.0.0.1";

  const router = createApiRouter({
    queue: options.queue,
    logger: options.logger,
    maxBodyBytes: options.maxBodyBytes,
  });
  const server = http.createServer((req, res) => router(req, res));
  await listen(server, host, port);

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Unable to determine API server address.");
  }

  const displayHost = host === "0.0.0.0" ? "127.0.0.1" : host;
  return {
    url: `http://${displayHost}:${address.port}`,
    port: address.port,
    close: () => closeServer(server),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("error", onError);
      reject(err);
    };

    server.once("error", onError);
    server.listen({ host, port }, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
