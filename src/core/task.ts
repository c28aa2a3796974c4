import { z } from "zod";

import { TaskTransitionError } from "./errors.js";
import { isoNow } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const TaskStatusSchema = z.enum(["pending", "processing", "completed", "failed", "cancelled"]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const EmotionModeSchema = z.enum(["speaker", "reference", "vector", "text"]);
export type EmotionMode = z.infer<typeof EmotionModeSchema>;

export const DEFAULT_MAX_TEXT_LENGTH = 500;

export function createSynthesisParamsSchema(maxTextLength = DEFAULT_MAX_TEXT_LENGTH) {
  return z
    .object({
      text: z.string().trim().min(1).max(maxTextLength),
      prompt_audio: z.string().min(1),
      emo_audio: z.string().min(1).nullable().default(null),
      speech_length: z.number().int().nonnegative().default(0),
      temperature: z.number().min(0.1).max(2).default(0.8),
      top_p: z.number().min(0).max(1).default(0.8),
      top_k: z.number().int().min(0).max(100).default(30),
      emo_weight: z.number().min(0).max(1).default(0.65),
      max_text_tokens_per_segment: z.number().int().min(20).max(300).default(120),
      do_sample: z.boolean().default(true),
      length_penalty: z.number().min(-2).max(2).default(0),
      num_beams: z.number().int().min(1).max(10).default(3),
      repetition_penalty: z.number().min(1).max(20).default(10),
      max_mel_tokens: z.number().int().min(100).max(3000).default(1500),
      interval_silence: z.number().int().min(0).max(2000).default(200),
      emo_mode: EmotionModeSchema.default("speaker"),
      emo_text: z.string().min(1).nullable().default(null),
      emo_vector: z.array(z.number().min(0).max(1)).length(8).nullable().default(null),
      emo_random: z.boolean().default(false),
    })
    .superRefine((params, ctx) => {
      if (params.emo_mode === "reference" && !params.emo_audio) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["emo_audio"],
          message: "emo_mode 'reference' requires emo_audio",
        });
      }
      if (params.emo_mode === "vector" && !params.emo_vector) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["emo_vector"],
          message: "emo_mode 'vector' requires emo_vector",
        });
      }
    });
}

export const SynthesisParamsSchema = createSynthesisParamsSchema();
export type SynthesisParams = z.infer<typeof SynthesisParamsSchema>;
export type SynthesisParamsInput = z.input<typeof SynthesisParamsSchema>;

// Stored snapshots were validated at submission under whatever text limit was configured then.
const StoredSynthesisParamsSchema = createSynthesisParamsSchema(Number.POSITIVE_INFINITY);

export const ResultRefSchema = z.object({
  path: z.string().min(1),
  size_bytes: z.number().int().nonnegative(),
  media_type: z.string().min(1),
});
export type ResultRef = z.infer<typeof ResultRefSchema>;

export const TaskErrorCodeSchema = z.enum([
  "synthesis_failed",
  "timeout",
  "artifact_failed",
  "interrupted",
]);
export type TaskErrorCode = z.infer<typeof TaskErrorCodeSchema>;

export const TaskErrorInfoSchema = z.object({
  code: TaskErrorCodeSchema,
  message: z.string(),
});
export type TaskErrorInfo = z.infer<typeof TaskErrorInfoSchema>;

export const TaskSchema = z.object({
  id: z.string().min(1),
  owner_id: z.string().min(1),
  status: TaskStatusSchema,
  progress: z.number().min(0).max(1),
  message: z.string(),
  params: StoredSynthesisParamsSchema,
  result_ref: ResultRefSchema.nullable(),
  error: TaskErrorInfoSchema.nullable(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
});
export type Task = z.infer<typeof TaskSchema>;

// =============================================================================
// STATE MACHINE
// =============================================================================

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  "completed",
  "failed",
  "cancelled",
]);

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["processing", "cancelled"],
  processing: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function createTask(args: {
  id: string;
  ownerId: string;
  params: SynthesisParams;
  now?: string;
}): Task {
  return {
    id: args.id,
    owner_id: args.ownerId,
    status: "pending",
    progress: 0,
    message: "Task queued",
    params: args.params,
    result_ref: null,
    error: null,
    created_at: args.now ?? isoNow(),
    started_at: null,
    completed_at: null,
  };
}

export function markTaskProcessing(task: Task, now: string = isoNow()): void {
  assertTransition(task, "processing");

  task.status = "processing";
  task.started_at = now;
  task.message = "Generating";
}

export function markTaskProgress(task: Task, progress: number, message?: string): boolean {
  if (task.status !== "processing") return false;

  // Completion alone sets 1.0.
  const clamped = Math.min(Math.max(progress, 0), 0.99);
  if (!Number.isFinite(clamped) || clamped < task.progress) return false;

  task.progress = clamped;
  if (message) task.message = message;
  return true;
}

export function markTaskCompleted(task: Task, resultRef: ResultRef, now: string = isoNow()): void {
  assertTransition(task, "completed");

  task.status = "completed";
  task.progress = 1;
  task.message = "Generation completed";
  task.result_ref = resultRef;
  task.completed_at = now;
}

export function markTaskFailed(task: Task, error: TaskErrorInfo, now: string = isoNow()): void {
  assertTransition(task, "failed");

  task.status = "failed";
  task.message = "Generation failed";
  task.error = error;
  task.completed_at = now;
}

export function markTaskCancelled(task: Task, now: string = isoNow()): void {
  assertTransition(task, "cancelled");

  task.status = "cancelled";
  task.message = "Task cancelled";
  task.completed_at = now;
}

function assertTransition(task: Task, to: TaskStatus): void {
  if (!canTransition(task.status, to)) {
    throw new TaskTransitionError(task.id, task.status, to);
  }
}
