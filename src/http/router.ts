import fs from "node:fs/promises";
import type { IncomingMessage, ServerResponse } from "node:http";

import { logQueueEvent, type EventLogger } from "../core/logger.js";
import type { Requester } from "../core/ownership.js";
import { TaskStatusSchema, type TaskStatus } from "../core/task.js";
import type { TaskQueue } from "../core/task-queue.js";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../core/task-registry.js";

import { buildApiErrorPayload, mapQueueError } from "./errors.js";
import { resolveRequester } from "./requester.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiRouterOptions = {
  queue: TaskQueue;
  logger: EventLogger;
  maxBodyBytes?: number;
};

type ApiRouteMatch =
  | { type: "health" }
  | { type: "jobs" }
  | { type: "job"; taskId: string }
  | { type: "job_audio"; taskId: string }
  | { type: "job_cancel"; taskId: string }
  | { type: "not_found" };

type OptionalNumberParseResult = { ok: true; value: number | null } | { ok: false };

type BodyReadResult =
  | { ok: true; value: unknown }
  | { ok: false; status: number; code: string; message: string };

const JOBS_PATH = "/v1/tts/jobs";
const DEFAULT_MAX_BODY_BYTES = 64 * 1024;
const TASK_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createApiRouter(
  options: ApiRouterOptions,
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logQueueEvent(options.logger, "http.request", {
        method: req.method ?? "GET",
        path: req.url ?? "/",
        status: res.statusCode,
        duration_ms: Date.now() - startedAt,
      });
    });

    void routeRequest(req, res, options);
  };
}

// =============================================================================
// ROUTING
// =============================================================================

async function routeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: ApiRouterOptions,
): Promise<void> {
  const method = (req.method ?? "GET").toUpperCase();

  let url: URL;
  try {
    url = new URL(req.url ?? "/", "http://127.0.0.1");
  } catch {
    sendApiError(res, 400, "bad_request", "Malformed request URL.");
    return;
  }

  try {
    await handleApiRequest(req, res, method, url, options);
  } catch (err) {
    if (res.headersSent) {
      res.end();
      return;
    }

    const mapped = mapQueueError(err);
    sendJson(res, mapped.status, mapped.payload);
  }
}

async function handleApiRequest(
  req: IncomingMessage,
  res: ServerResponse,
  method: string,
  url: URL,
  options: ApiRouterOptions,
): Promise<void> {
  const route = matchApiRoute(url.pathname);
  if (route.type === "not_found") {
    sendApiError(res, 404, "not_found", "Endpoint not found.");
    return;
  }

  if (route.type === "health") {
    if (!allowMethod(res, method, ["GET"])) return;
    handleHealth(res, options.queue);
    return;
  }

  const requester = resolveRequester(req.headers);
  if (!requester) {
    sendApiError(res, 401, "unauthenticated", "Missing requester identity.");
    return;
  }

  switch (route.type) {
    case "jobs":
      if (!allowMethod(res, method, ["GET", "POST"])) return;
      if (method === "POST") {
        await handleSubmit(req, res, requester, options);
      } else {
        handleList(res, url, requester, options.queue);
      }
      return;
    case "job":
      if (!allowMethod(res, method, ["GET", "DELETE"])) return;
      if (method === "DELETE") {
        await options.queue.delete(route.taskId, requester);
        sendJson(res, 200, { ok: true, result: { task_id: route.taskId, deleted: true } });
      } else {
        sendJson(res, 200, { ok: true, result: options.queue.get(route.taskId, requester) });
      }
      return;
    case "job_cancel":
      if (!allowMethod(res, method, ["POST"])) return;
      sendJson(res, 200, { ok: true, result: options.queue.cancel(route.taskId, requester) });
      return;
    case "job_audio":
      if (!allowMethod(res, method, ["GET"])) return;
      await handleAudio(res, route.taskId, requester, options.queue);
      return;
  }
}

function matchApiRoute(pathname: string): ApiRouteMatch {
  if (pathname === "/health") {
    return { type: "health" };
  }

  const trimmed = pathname.replace(/\/+$/, "");
  if (trimmed === JOBS_PATH) {
    return { type: "jobs" };
  }
  if (!trimmed.startsWith(`${JOBS_PATH}/`)) {
    return { type: "not_found" };
  }

  const [taskId, action, ...rest] = trimmed.slice(JOBS_PATH.length + 1).split("/");
  if (!taskId || !TASK_ID_PATTERN.test(taskId) || rest.length > 0) {
    return { type: "not_found" };
  }

  if (action === undefined) return { type: "job", taskId };
  if (action === "audio") return { type: "job_audio", taskId };
  if (action === "cancel") return { type: "job_cancel", taskId };
  return { type: "not_found" };
}

// =============================================================================
// HANDLERS
// =============================================================================

function handleHealth(res: ServerResponse, queue: TaskQueue): void {
  const stats = queue.stats();
  sendJson(res, 200, {
    status: "healthy",
    active_tasks: stats.processing,
    queue_length: stats.pending,
    max_workers: stats.max_concurrent,
    available_slots: stats.available_slots,
  });
}

async function handleSubmit(
  req: IncomingMessage,
  res: ServerResponse,
  requester: Requester,
  options: ApiRouterOptions,
): Promise<void> {
  const body = await readJsonBody(req, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
  if (!body.ok) {
    sendApiError(res, body.status, body.code, body.message);
    return;
  }

  const { taskId, view } = options.queue.submit(requester.id, body.value);
  const self = `${JOBS_PATH}/${taskId}`;

  res.setHeader("Location", self);
  sendJson(res, 202, {
    ok: true,
    result: {
      task_id: taskId,
      status: view.status,
      queue_position: view.queue_position,
      links: { self, audio: `${self}/audio`, cancel: `${self}/cancel` },
    },
  });
}

function handleList(res: ServerResponse, url: URL, requester: Requester, queue: TaskQueue): void {
  const page = parseOptionalPositiveInteger(url.searchParams.get("page"));
  if (!page.ok) {
    sendApiError(res, 400, "bad_request", "Invalid page value.");
    return;
  }

  const pageSize = parseOptionalPositiveInteger(url.searchParams.get("page_size"));
  if (!pageSize.ok || (pageSize.value !== null && pageSize.value > MAX_PAGE_SIZE)) {
    sendApiError(res, 400, "bad_request", `page_size must be between 1 and ${MAX_PAGE_SIZE}.`);
    return;
  }

  const status = parseStatusParam(url.searchParams.get("status"));
  if (!status.ok) {
    sendApiError(res, 400, "bad_request", "Invalid status value.");
    return;
  }

  const result = queue.list(requester.id, {
    page: page.value ?? 1,
    pageSize: pageSize.value ?? DEFAULT_PAGE_SIZE,
    status: status.value,
  });

  sendJson(res, 200, {
    ok: true,
    result: {
      tasks: result.tasks,
      total: result.total,
      page: result.page,
      page_size: result.pageSize,
      pages: Math.ceil(result.total / result.pageSize),
    },
  });
}

async function handleAudio(
  res: ServerResponse,
  taskId: string,
  requester: Requester,
  queue: TaskQueue,
): Promise<void> {
  const ref = queue.getResult(taskId, requester);

  let audio: Buffer;
  try {
    audio = await fs.readFile(ref.path);
  } catch {
    sendApiError(res, 410, "audio_missing", "The audio file is no longer available.");
    return;
  }

  res.statusCode = 200;
  res.setHeader("Content-Type", ref.media_type);
  res.setHeader("Content-Length", audio.byteLength);
  res.setHeader("Content-Disposition", `attachment; filename="${taskId}.wav"`);
  res.end(audio);
}

// =============================================================================
// RESPONSES
// =============================================================================

function allowMethod(res: ServerResponse, method: string, allowed: string[]): boolean {
  if (allowed.includes(method)) return true;

  res.setHeader("Allow", allowed.join(", "));
  sendApiError(res, 405, "method_not_allowed", `Method ${method} not allowed.`);
  return false;
}

function sendApiError(res: ServerResponse, status: number, code: string, message: string): void {
  sendJson(res, status, buildApiErrorPayload({ code, message }));
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader("Content-Length", Buffer.byteLength(body));
  res.end(body);
}

// =============================================================================
// UTILITIES
// =============================================================================

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<BodyReadResult> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.byteLength;
    if (size > maxBytes) {
      return {
        ok: false,
        status: 413,
        code: "payload_too_large",
        message: `Request body exceeds ${maxBytes} bytes.`,
      };
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (!raw) {
    return { ok: false, status: 400, code: "bad_request", message: "Request body is required." };
  }

  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false, status: 400, code: "bad_request", message: "Request body is not valid JSON." };
  }
}

function parseOptionalPositiveInteger(value: string | null): OptionalNumberParseResult {
  if (value === null) {
    return { ok: true, value: null };
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return { ok: true, value: null };
  }

  if (!/^\d+$/.test(trimmed)) {
    return { ok: false };
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    return { ok: false };
  }

  return { ok: true, value: parsed };
}

function parseStatusParam(
  value: string | null,
): { ok: true; value: TaskStatus | undefined } | { ok: false } {
  const trimmed = value?.trim();
  if (!trimmed) {
    return { ok: true, value: undefined };
  }

  const parsed = TaskStatusSchema.safeParse(trimmed);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false };
}
