#!/usr/bin/env node
/**
 * toolloop CLI - run instructions, serve the HTTP gateway, inspect tasks and tools
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command } from "commander";

import listTasks from "./cli/commands/agent/list-tasks.js";
import run, { type RunOptions } from "./cli/commands/agent/run.js";
import serve from "./cli/commands/runtime/serve.js";
import listTools from "./cli/commands/tools/list.js";
import type { GlobalOptions } from "./cli/context.js";
import { formatError, handleError, parseIntegerArg, parseNumberArg } from "./cli/error-handler.js";
import { loadConfig } from "./config.js";
import { VERSION } from "./version.js";

export const program = new Command();

program
  .name("toolloop")
  .description("Tool-calling agent loop over interchangeable LLM providers")
  .version(VERSION)
  .option("-c, --config <path>", "Path to toolloop.config.json")
  .option("-v, --verbose", "Log to stderr and show stack traces")
  .option("-q, --quiet", "Quiet mode - minimal output");

function globals(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

program
  .command("run")
  .description("Execute one instruction and print the final answer")
  .argument("<instruction...>", "What the agent should do")
  .option("-p, --provider <name>", "Provider override (gemini, codex, opus)")
  .option("-m, --model <name>", "Model override")
  .option("-t, --temperature <n>", "Sampling temperature override", parseNumberArg)
  .option("-s, --system-prompt <text>", "System prompt override")
  .option("-d, --debug", "Attach the execution trace")
  .option("--json", "Print the result as JSON")
  .action(async (words: string[], options: Omit<RunOptions, "quiet" | "verbose">, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await run(cfg, words.join(" "), { ...options, quiet: g.quiet, verbose: g.verbose });
    }, g.verbose);
  });

program
  .command("serve")
  .description("Start the HTTP gateway")
  .option("-H, --host <host>", "Bind address (defaults to gateway.host)")
  .option("-P, --port <port>", "Port (defaults to gateway.port)", parseIntegerArg)
  .action(async (options: { host?: string; port?: number }, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await serve(cfg, { ...options, quiet: g.quiet });
    }, g.verbose);
  });

program
  .command("tasks")
  .description("List recorded tasks, newest first")
  .option("-n, --limit <n>", "Maximum number of tasks (0 for all)", parseIntegerArg, 10)
  .option("--json", "Output as JSON")
  .action(async (options: { limit: number; json?: boolean }, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await listTasks(cfg, { ...options, quiet: g.quiet, verbose: g.verbose });
    }, g.verbose);
  });

program
  .command("tools")
  .description("List the built-in tools")
  .option("--json", "Output as JSON")
  .action(async (options: { json?: boolean }, cmd: Command) => {
    const g = globals(cmd);
    await handleError(() => listTools({ ...options, quiet: g.quiet }), g.verbose);
  });

// =============================================================================
// PARSE AND RUN
// =============================================================================

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch((err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}
