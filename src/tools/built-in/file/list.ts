/**
 * File List Tool - List directory contents
 */

import fs from "node:fs/promises";

import { z } from "zod";

import { defineParams, defineTool } from "../../../agent/tool-registry.js";
import { type BuiltinToolContext, parseArgs, resolvePath } from "../context.js";

const ArgsSchema = z.object({
  path: z.string().optional(),
});

export default defineTool<BuiltinToolContext>({
  meta: {
    name: "list_dir",
    description: "List contents of a directory",
  },
  parameters: defineParams({
    path: { type: "string", description: "Directory path (defaults to workspace)" },
  }),
  async execute(args, ctx) {
    const { path: target } = parseArgs("list_dir", ArgsSchema, args);
    const dir = target?.trim() ? resolvePath(target, ctx.workspaceDir) : ctx.workspaceDir;
    const label = target?.trim() || ".";

    const stats = await fs.stat(dir).catch((err: unknown) => {
      throw new Error(`Path not found: ${label}`, { cause: err });
    });
    if (!stats.isDirectory()) {
      throw new Error(`Not a directory: ${label}`);
    }

    const entries = await fs.readdir(dir, { withFileTypes: true });
    const lines = entries
      .map((entry) => ({ name: entry.name, isDir: entry.isDirectory() }))
      .sort((a, b) => {
        if (a.isDir !== b.isDir) return a.isDir ? -1 : 1;
        return compareText(a.name.toLowerCase(), b.name.toLowerCase()) || compareText(a.name, b.name);
      })
      .map((entry) => `${entry.isDir ? "d" : "f"} ${entry.name}`);

    return lines.join("\n") || "(empty directory)";
  },
});

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
