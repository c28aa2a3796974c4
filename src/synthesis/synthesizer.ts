/**
 * Synthesizer port: the only way the queue reaches the speech model.
 * Purpose: keep scheduling independent of how audio is produced.
 * Assumptions: one call per task; the promise settles with the complete audio file.
 * Usage: implement `synthesize` and hand the instance to the task queue.
 */

import type { SynthesisParams } from "../core/task.js";

export type SynthesisRequest = {
  taskId: string;
  params: SynthesisParams;
};

/**
 * Reports a fraction in [0, 1). Doubles as the cancellation checkpoint: it throws
 * the abort reason once the task has been cancelled or timed out.
 */
export type ProgressReporter = (fraction: number, message?: string) => void;

export type SynthesisContext = {
  signal: AbortSignal;
  onProgress: ProgressReporter;
};

export interface Synthesizer {
  synthesize(request: SynthesisRequest, context: SynthesisContext): Promise<Uint8Array>;
}
