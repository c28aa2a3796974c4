import fs from "node:fs";
import path from "node:path";

import { loadQueueConfig, type QueueConfig } from "../core/config.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Order: --config, then SPEECH_QUEUE_CONFIG, then ./speech-queue.yaml when present.
// With none of these the defaults and environment overrides apply.
// =============================================================================

export const CONFIG_ENV_VAR = "SPEECH_QUEUE_CONFIG";
export const DEFAULT_CONFIG_FILENAME = "speech-queue.yaml";

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export function resolveConfigPath(args: LoadConfigForCliArgs): string | undefined {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  if (args.explicitConfigPath) {
    return path.resolve(cwd, args.explicitConfigPath);
  }

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }

  const candidate = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  return fs.existsSync(candidate) ? candidate : undefined;
}

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): {
  config: QueueConfig;
  configPath: string | undefined;
} {
  const configPath = resolveConfigPath(args);
  const config = loadQueueConfig({ configPath, env: args.env });
  return { config, configPath };
}
