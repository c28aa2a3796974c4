import { Command } from "commander";

import { loadConfigForCli } from "./config.js";
import { serveCommand } from "./serve.js";
import { registerTasksCommand } from "./tasks.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type ServeOptions = {
  host?: string;
  port?: number;
  mock?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("speech-queue")
    .description("Bounded-concurrency job queue for text-to-speech synthesis")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Queue config path (defaults to $SPEECH_QUEUE_CONFIG or ./speech-queue.yaml)",
    )
    .option("--debug", "Include stack traces in error output")
    .option("--no-debug", "Suppress stack traces in error output");

  program
    .command("serve")
    .description("Boot the queue and serve the HTTP API")
    .option("--host <host>", "Bind address (default: config host)")
    .option("--port <n>", "Port (default: config port)", (v: string) => parseInt(v, 10))
    .option("--mock", "Use the mock synthesizer regardless of config", false)
    .action(async (opts: ServeOptions) => {
      const globals = program.opts<GlobalOptions>();
      const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
      await serveCommand(config, { host: opts.host, port: opts.port, mock: opts.mock });
    });

  registerTasksCommand(program);

  return program;
}
