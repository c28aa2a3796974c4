import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigError } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const MockSynthesizerSchema = z.object({
  kind: z.literal("mock"),
  delay_ms: z.number().int().nonnegative().default(1500),
});

const CommandSynthesizerSchema = z.object({
  kind: z.literal("command"),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
});

const SynthesizerConfigSchema = z.discriminatedUnion("kind", [
  MockSynthesizerSchema,
  CommandSynthesizerSchema,
]);

export type SynthesizerConfig = z.infer<typeof SynthesizerConfigSchema>;

export const MAX_TIMER_SECONDS = 2_147_483;

export const QueueConfigSchema = z.object({
  // Admission bound on concurrently executing synthesis jobs.
  max_concurrent_tasks: z.coerce.number().int().min(1).default(3),
  // Seconds. Timer-backed values stay within the 2^31-1 ms range Node timers accept.
  task_timeout: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(300),
  task_retention: z.coerce.number().positive().default(3600),
  cleanup_interval: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(600),

  output_dir: z.string().min(1).default("./outputs/api"),
  database_path: z.string().min(1).default("./data/speech-queue.db"),
  log_file: z.string().min(1).default("./logs/speech-queue.jsonl"),

  host: z.string().min(1).default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  max_text_length: z.coerce.number().int().positive().default(500),

  synthesizer: SynthesizerConfigSchema.default({ kind: "mock" }),
});

export type QueueConfig = z.infer<typeof QueueConfigSchema>;

// Environment variables that override file values, keyed by config field.
const ENV_OVERRIDES = {
  max_concurrent_tasks: "MAX_CONCURRENT_TASKS",
  task_timeout: "TASK_TIMEOUT",
  task_retention: "TASK_RETENTION",
  cleanup_interval: "CLEANUP_INTERVAL",
  output_dir: "OUTPUT_DIR",
  database_path: "DATABASE_PATH",
  log_file: "LOG_FILE",
  host: "HOST",
  port: "PORT",
  max_text_length: "MAX_TEXT_LENGTH",
} as const satisfies Partial<Record<keyof QueueConfig, string>>;

const INVALID_CONFIG_HINT =
  "Fix the config file or the environment variable named above, then rerun.";

// =============================================================================
// LOADING
// =============================================================================

export type LoadQueueConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadQueueConfig(options: LoadQueueConfigOptions = {}): QueueConfig {
  const env = options.env ?? process.env;
  const fileDoc = options.configPath ? readConfigFile(options.configPath, env) : {};
  const merged = { ...fileDoc, ...readEnvOverrides(env) };

  const parsed = QueueConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const source = options.configPath ?? "environment";
    throw new ConfigError(
      `Invalid queue config (${source})\n${parsed.error.toString()}`,
      parsed.error,
      INVALID_CONFIG_HINT,
    );
  }

  const cfg = parsed.data;
  return {
    ...cfg,
    output_dir: path.resolve(cfg.output_dir),
    database_path: path.resolve(cfg.database_path),
    log_file: path.resolve(cfg.log_file),
  };
}

function readConfigFile(configPath: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Queue config not found at: ${configPath}`);
  }

  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML config: ${configPath}`, err);
  }

  if (doc === undefined || doc === null) {
    return {};
  }
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(`Queue config must be a YAML mapping: ${configPath}`);
  }

  const expanded = expandEnv(doc, { file: configPath, trail: [], env });
  return isRecord(expanded) ? expanded : {};
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") {
      overrides[key] = value.trim();
    }
  }
  return overrides;
}

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
