/**
 * File Read Tool - Read a text file
 */

import fs from "node:fs/promises";

import { z } from "zod";

import { defineParams, defineTool } from "../../../agent/tool-registry.js";
import { type BuiltinToolContext, parseArgs, resolvePath } from "../context.js";

const ArgsSchema = z.object({
  path: z.string().min(1),
});

export default defineTool<BuiltinToolContext>({
  meta: {
    name: "read_file",
    description: "Read the contents of a file",
  },
  parameters: defineParams(
    {
      path: { type: "string", description: "Path to the file (relative to workspace or absolute)" },
    },
    ["path"],
  ),
  async execute(args, ctx) {
    const { path: target } = parseArgs("read_file", ArgsSchema, args);
    const filePath = resolvePath(target, ctx.workspaceDir);

    const stats = await fs.stat(filePath).catch((err: unknown) => {
      throw new Error(`File not found: ${target}`, { cause: err });
    });
    if (!stats.isFile()) {
      throw new Error(`Not a file: ${target}`);
    }
    return fs.readFile(filePath, "utf-8");
  },
});
