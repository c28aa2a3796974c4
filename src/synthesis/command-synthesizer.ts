/**
 * CommandSynthesizer runs an external program once per task.
 * Purpose: keep the speech model in its own process so a hung or crashing model
 * cannot take the queue down with it.
 * Protocol:
 * - stdin receives `{ "task_id": ..., "params": {...} }` as JSON.
 * - SPEECH_QUEUE_OUTPUT names the file the program must write the audio to.
 * - stderr lines of the form `progress <fraction> [message]` report progress; other lines are kept
 *   for the error message.
 * - exit code 0 means the output file is complete.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { SynthesisError } from "../core/errors.js";

import type { SynthesisContext, SynthesisRequest, Synthesizer } from "./synthesizer.js";

export const OUTPUT_ENV_VAR = "SPEECH_QUEUE_OUTPUT";
export const TASK_ID_ENV_VAR = "SPEECH_QUEUE_TASK_ID";

const STDERR_TAIL_LINES = 20;

export type CommandSynthesizerOptions = {
  command: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type ProgressLine = {
  fraction: number;
  message?: string;
};

export class CommandSynthesizer implements Synthesizer {
  constructor(private readonly options: CommandSynthesizerOptions) {}

  async synthesize(request: SynthesisRequest, context: SynthesisContext): Promise<Uint8Array> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "speech-queue-"));
    const outputPath = path.join(workDir, "output.wav");
    const stderrTail: string[] = [];

    try {
      const subprocess = execa(this.options.command, this.options.args ?? [], {
        cwd: this.options.cwd,
        env: {
          ...(this.options.env ?? process.env),
          [OUTPUT_ENV_VAR]: outputPath,
          [TASK_ID_ENV_VAR]: request.taskId,
        },
        input: JSON.stringify({ task_id: request.taskId, params: request.params }),
        cancelSignal: context.signal,
        reject: false,
        stdout: "ignore",
      });

      let pending = "";
      subprocess.stderr?.on("data", (chunk: Buffer | string) => {
        pending += chunk.toString();
        const lines = pending.split(/\r?\n/);
        pending = lines.pop() ?? "";
        for (const line of lines) {
          if (!this.handleStderrLine(line, context, stderrTail)) {
            subprocess.kill();
          }
        }
      });

      const result = await subprocess;
      if (pending) this.handleStderrLine(pending, context, stderrTail);

      if (context.signal.aborted) {
        throw context.signal.reason;
      }
      if (result.exitCode !== 0) {
        const detail = stderrTail.join("\n") || "no stderr output";
        throw new SynthesisError(
          `${this.options.command} exited with code ${result.exitCode ?? "unknown"}: ${detail}`,
        );
      }
      if (!(await fse.pathExists(outputPath))) {
        throw new SynthesisError(`${this.options.command} exited without writing ${OUTPUT_ENV_VAR}`);
      }

      const audio = await fs.readFile(outputPath);
      return new Uint8Array(audio.buffer, audio.byteOffset, audio.byteLength);
    } finally {
      await fse.remove(workDir);
    }
  }

  // Returns false once the progress checkpoint reports the task was stopped.
  private handleStderrLine(line: string, context: SynthesisContext, tail: string[]): boolean {
    const progress = parseProgressLine(line);
    if (!progress) {
      if (line.trim()) {
        tail.push(line);
        if (tail.length > STDERR_TAIL_LINES) tail.shift();
      }
      return true;
    }

    try {
      context.onProgress(progress.fraction, progress.message);
      return true;
    } catch (err) {
      tail.push(`stopped: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }
}

export function parseProgressLine(line: string): ProgressLine | null {
  const match = /^progress\s+([0-9]*\.?[0-9]+)(?:\s+(.*))?$/.exec(line.trim());
  if (!match) return null;

  const fraction = Number(match[1]);
  if (!Number.isFinite(fraction)) return null;

  const message = match[2]?.trim();
  return message ? { fraction, message } : { fraction };
}
