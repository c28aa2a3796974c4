import { describe, expect, it, vi } from "vitest";

import { validParams } from "../core/__tests__/fakes.js";
import { SynthesisError } from "../core/errors.js";
import { SynthesisParamsSchema } from "../core/task.js";

import { CommandSynthesizer, parseProgressLine } from "./command-synthesizer.js";

// =============================================================================
// HELPERS
// =============================================================================

function nodeScript(source: string): CommandSynthesizer {
  return new CommandSynthesizer({ command: process.execPath, args: ["-e", source] });
}

function request(taskId = "task-7") {
  return { taskId, params: SynthesisParamsSchema.parse(validParams()) };
}

const READ_STDIN = `
const fs = require("node:fs");
let input = "";
process.stdin.on("data", (chunk) => { input += chunk; });
`;

// =============================================================================
// TESTS
// =============================================================================

describe("CommandSynthesizer", () => {
  it("passes the request on stdin and reads the output file", async () => {
    const synthesizer = nodeScript(`${READ_STDIN}
process.stdin.on("end", () => {
  const req = JSON.parse(input);
  process.stderr.write("progress 0.5 Halfway there\\n");
  fs.writeFileSync(process.env.SPEECH_QUEUE_OUTPUT, "RIFF:" + req.task_id + ":" + req.params.text);
});
`);
    const onProgress = vi.fn();

    const audio = await synthesizer.synthesize(request(), {
      signal: new AbortController().signal,
      onProgress,
    });

    expect(Buffer.from(audio).toString("utf8")).toBe("RIFF:task-7:Hello from the queue");
    expect(onProgress).toHaveBeenCalledWith(0.5, "Halfway there");
  });

  it("fails with the stderr tail when the program exits non-zero", async () => {
    const synthesizer = nodeScript(`
process.stderr.write("model weights missing\\n");
process.exit(3);
`);

    const result = synthesizer.synthesize(request(), {
      signal: new AbortController().signal,
      onProgress: () => undefined,
    });

    await expect(result).rejects.toBeInstanceOf(SynthesisError);
    await expect(result).rejects.toThrow(
      `${process.execPath} exited with code 3: model weights missing`,
    );
  });

  it("fails when the program exits without writing audio", async () => {
    const synthesizer = nodeScript("process.exit(0);");

    await expect(
      synthesizer.synthesize(request(), {
        signal: new AbortController().signal,
        onProgress: () => undefined,
      }),
    ).rejects.toThrow(`${process.execPath} exited without writing SPEECH_QUEUE_OUTPUT`);
  });

  it("kills the program and rejects with the abort reason", async () => {
    const synthesizer = nodeScript(`
process.stderr.write("progress 0.1 started\\n");
setTimeout(() => undefined, 30000);
`);
    const controller = new AbortController();
    const reason = new Error("cancelled by requester");

    await expect(
      synthesizer.synthesize(request(), {
        signal: controller.signal,
        onProgress: () => controller.abort(reason),
      }),
    ).rejects.toBe(reason);
  });

  it("stops the program when the progress checkpoint throws", async () => {
    const synthesizer = nodeScript(`
process.stderr.write("progress 0.1 started\\n");
setTimeout(() => undefined, 30000);
`);

    await expect(
      synthesizer.synthesize(request(), {
        signal: new AbortController().signal,
        onProgress: () => {
          throw new Error("halt");
        },
      }),
    ).rejects.toThrow("stopped: halt");
  });
});

describe("parseProgressLine", () => {
  it("reads a fraction with an optional message", () => {
    expect(parseProgressLine("progress 0.25")).toEqual({ fraction: 0.25 });
    expect(parseProgressLine("  progress .5 Decoding waveform ")).toEqual({
      fraction: 0.5,
      message: "Decoding waveform",
    });
  });

  it("ignores other stderr output", () => {
    expect(parseProgressLine("Loading checkpoint")).toBeNull();
    expect(parseProgressLine("progress half")).toBeNull();
    expect(parseProgressLine("")).toBeNull();
  });
});
