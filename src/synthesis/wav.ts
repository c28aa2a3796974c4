export const WAV_HEADER_BYTES = 44;

export type SilentWavOptions = {
  durationMs: number;
  sampleRate?: number;
};

// 16-bit mono PCM, all samples zero.
export function encodeSilentWav(options: SilentWavOptions): Uint8Array {
  const sampleRate = options.sampleRate ?? 22050;
  const bytesPerSample = 2;
  const sampleCount = Math.max(0, Math.round((options.durationMs / 1000) * sampleRate));
  const dataBytes = sampleCount * bytesPerSample;

  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);
  buffer.write("RIFF", 0, "ascii");
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write("WAVE", 8, "ascii");
  buffer.write("fmt ", 12, "ascii");
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * bytesPerSample, 28);
  buffer.writeUInt16LE(bytesPerSample, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write("data", 36, "ascii");
  buffer.writeUInt32LE(dataBytes, 40);

  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
