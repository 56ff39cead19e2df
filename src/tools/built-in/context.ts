import os from "node:os";
import path from "node:path";

import type { z } from "zod";

import { ToolArgumentError } from "../../agent/tool-registry.js";
import type { JsonObject, ToolContext } from "../../agent/types.js";
import type { Logger } from "../../log.js";

export interface BuiltinToolContext extends ToolContext {
  workspaceDir: string;
  logger: Logger;
}

export function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, args: JsonObject): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "arguments";
    throw new ToolArgumentError(`${tool}: invalid ${field}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export function resolvePath(value: string, workspaceDir: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ToolArgumentError("path is required");
  if (trimmed === "~") return os.homedir();
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  if (path.isAbsolute(trimmed)) {
    return trimmed;
  }
  return path.resolve(workspaceDir, trimmed);
}
