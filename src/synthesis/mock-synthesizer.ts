import { setTimeout as delay } from "node:timers/promises";

import type { SynthesisContext, SynthesisRequest, Synthesizer } from "./synthesizer.js";
import { encodeSilentWav } from "./wav.js";

const STAGES = [
  { fraction: 0.1, message: "Loading reference audio" },
  { fraction: 0.3, message: "Encoding text" },
  { fraction: 0.6, message: "Generating speech tokens" },
  { fraction: 0.9, message: "Decoding waveform" },
] as const;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

export function isMockSynthesisEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.MOCK_SYNTHESIS;
  if (!flag) return false;

  return TRUE_VALUES.has(flag.trim().toLowerCase());
}

export type MockSynthesizerOptions = {
  delayMs?: number;
};

// Walks through fixed stages and returns silence; stands in for the model in local runs.
export class MockSynthesizer implements Synthesizer {
  private readonly delayMs: number;

  constructor(options: MockSynthesizerOptions = {}) {
    this.delayMs = options.delayMs ?? 1500;
  }

  async synthesize(request: SynthesisRequest, context: SynthesisContext): Promise<Uint8Array> {
    const stepMs = Math.floor(this.delayMs / STAGES.length);

    for (const stage of STAGES) {
      await delay(stepMs, undefined, { signal: context.signal });
      context.onProgress(stage.fraction, stage.message);
    }

    const { params } = request;
    const durationMs = params.speech_length > 0 ? params.speech_length : params.text.length * 80;
    return encodeSilentWav({ durationMs });
  }
}
