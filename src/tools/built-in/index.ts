import type { ToolRegistry } from "../../agent/tool-registry.js";
import type { ToolDefinition } from "../../agent/types.js";
import type { Logger } from "../../log.js";
import giveResult from "./agent/give-result.js";
import type { BuiltinToolContext } from "./context.js";
import listDir from "./file/list.js";
import readFile from "./file/read.js";
import writeFile from "./file/write.js";
import bash from "./system/bash.js";

export const BUILTIN_TOOLS: readonly ToolDefinition<BuiltinToolContext>[] = [
  bash,
  readFile,
  writeFile,
  listDir,
  giveResult,
];

/**
 * Register bash, read_file, write_file, list_dir and give_result. Relative
 * paths given to them resolve against `workspaceDir`.
 */
export function registerBuiltins(registry: ToolRegistry, params: { workspaceDir: string; logger: Logger }): void {
  const logger = params.logger.child({ component: "tools" });
  for (const tool of BUILTIN_TOOLS) {
    registry.register(
      tool.meta.name,
      (args, ctx) => tool.execute(args, { ...ctx, workspaceDir: params.workspaceDir, logger }),
      { name: tool.meta.name, description: tool.meta.description, parameters: tool.parameters },
    );
  }
}
