/**
 * Bash Tool - Run shell commands
 */

import { spawn } from "node:child_process";

import { z } from "zod";

import { defineParams, defineTool } from "../../../agent/tool-registry.js";
import { type BuiltinToolContext, parseArgs, resolvePath } from "../context.js";

export const DEFAULT_BASH_TIMEOUT_SECONDS = 30;

const MAX_STREAM_CHARS = 2_000_000;

const ArgsSchema = z.object({
  command: z.string().min(1),
  timeout: z.number().positive().optional(),
  cwd: z.string().optional(),
});

export default defineTool<BuiltinToolContext>({
  meta: {
    name: "bash",
    description: "Execute a bash command and return output",
  },
  parameters: defineParams(
    {
      command: { type: "string", description: "The command to execute" },
      timeout: { type: "integer", description: "Timeout in seconds (default 30)" },
      cwd: { type: "string", description: "Working directory (defaults to workspace)" },
    },
    ["command"],
  ),
  async execute(args, ctx) {
    const { command, timeout, cwd } = parseArgs("bash", ArgsSchema, args);
    const timeoutSeconds = timeout ?? DEFAULT_BASH_TIMEOUT_SECONDS;
    const workingDir = cwd?.trim() ? resolvePath(cwd, ctx.workspaceDir) : ctx.workspaceDir;

    ctx.logger.info({ tool: "bash", command, cwd: workingDir, timeoutSeconds }, "Bash command started");

    const result = await runCommand({
      command,
      cwd: workingDir,
      timeoutMs: timeoutSeconds * 1000,
      signal: ctx.signal,
    });

    if (result.timedOut) {
      ctx.logger.warn({ tool: "bash", command, timeoutSeconds }, "Bash command timed out");
      throw new Error(`Command timed out after ${timeoutSeconds}s`);
    }

    ctx.logger.info(
      {
        tool: "bash",
        exitCode: result.exitCode,
        stdoutLength: result.stdout.length,
        stderrLength: result.stderr.length,
      },
      "Bash command completed",
    );

    return formatCommandOutput(result);
  },
});

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

/**
 * stdout, then a `[stderr]` section when stderr is non-empty, then
 * `[exit code: N]` on a non-zero exit.
 */
export function formatCommandOutput(result: CommandResult): string {
  let output = result.stdout;
  if (result.stderr) {
    output += `\n[stderr]\n${result.stderr}`;
  }
  if (result.exitCode !== 0) {
    output += `\n[exit code: ${result.exitCode ?? "unknown"}]`;
  }
  return output.trim() || "(no output)";
}

function runCommand(params: {
  command: string;
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const child = spawn(params.command, {
      cwd: params.cwd,
      env: process.env,
      shell: true,
      signal: params.signal,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, params.timeoutMs);

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
      if (stdout.length > MAX_STREAM_CHARS) stdout = stdout.slice(-MAX_STREAM_CHARS);
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > MAX_STREAM_CHARS) stderr = stderr.slice(-MAX_STREAM_CHARS);
    });

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ stdout, stderr, exitCode: code, timedOut });
    });
  });
}
