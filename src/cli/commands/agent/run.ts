/**
 * Agent Run Command - Execute one instruction and print the answer
 */

import { createAgent } from "../../../agent/create-agent.js";
import type { ToolloopConfig } from "../../../config.js";
import { toExecuteResponse } from "../../../gateway/server.js";
import type { Logger } from "../../../log.js";
import { createCommandLogger } from "../../context.js";
import { RuntimeError, ValidationError } from "../../error-handler.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface RunOptions {
  provider?: string;
  model?: string;
  temperature?: number;
  systemPrompt?: string;
  debug?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export async function run(cfg: ToolloopConfig, instruction: string, options: RunOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });

  const trimmed = instruction.trim();
  if (!trimmed) {
    throw new ValidationError("Instruction is empty", "Pass the instruction as arguments: toolloop run \"...\"");
  }

  const logger = options.logger ?? createCommandLogger(cfg, options.verbose);
  const agent = await createAgent({ config: cfg, env: options.env, logger });

  const result = await agent.execute(trimmed, {
    overrides: {
      provider: options.provider,
      model: options.model,
      temperature: options.temperature,
      systemPrompt: options.systemPrompt,
      debug: options.debug,
    },
  });
  await agent.getTaskStore()?.flush();

  if (options.json) {
    out.json(toExecuteResponse(result));
    if (!result.success) process.exitCode = 1;
    return;
  }

  if (!result.success) {
    throw new RuntimeError(result.error || "execution failed");
  }

  out.raw(result.output);
  if (options.debug && result.trace) {
    out.header("Trace");
    out.keyValue("provider", result.trace.provider);
    out.keyValue("model", result.trace.model);
    out.keyValue("iterations", result.trace.iterations);
    for (const call of result.trace.toolCalls) {
      out.listItem(`${call.name} ${JSON.stringify(call.args)}`);
    }
  }
  if (result.taskId) {
    out.print(`task ${result.taskId}`, "debug");
  }
}

export default run;
