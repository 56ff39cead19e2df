/**
 * File Write Tool - Write text files, creating parent directories
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { defineParams, defineTool } from "../../../agent/tool-registry.js";
import { type BuiltinToolContext, parseArgs, resolvePath } from "../context.js";

const ArgsSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export default defineTool<BuiltinToolContext>({
  meta: {
    name: "write_file",
    description: "Write content to a file (creates parent directories if needed)",
  },
  parameters: defineParams(
    {
      path: { type: "string", description: "Path to the file (relative to workspace or absolute)" },
      content: { type: "string", description: "Content to write" },
    },
    ["path", "content"],
  ),
  async execute(args, ctx) {
    const { path: target, content } = parseArgs("write_file", ArgsSchema, args);
    const filePath = resolvePath(target, ctx.workspaceDir);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");

    const bytes = Buffer.byteLength(content, "utf-8");
    ctx.logger.debug({ tool: "write_file", filePath, bytes }, "File written");
    return `Wrote ${bytes} bytes to ${target}`;
  },
});
