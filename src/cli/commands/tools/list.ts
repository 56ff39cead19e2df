/**
 * Tools List Command - Show the built-in tools and their parameters
 */

import { BUILTIN_TOOLS } from "../../../tools/built-in/index.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface ListToolsOptions {
  json?: boolean;
  quiet?: boolean;
}

export async function listTools(options: ListToolsOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const tools = BUILTIN_TOOLS.map((tool) => ({
    name: tool.meta.name,
    description: tool.meta.description,
    parameters: tool.parameters,
  }));

  if (options.json) {
    out.json(tools);
    return;
  }

  out.header("Available Tools");
  for (const tool of tools) {
    out.listItem(`${tool.name} - ${tool.description}`);
    const required = new Set(tool.parameters.required ?? []);
    for (const [param, schema] of Object.entries(tool.parameters.properties ?? {})) {
      const flag = required.has(param) ? "" : "?";
      out.listItem(`${param}${flag}: ${schema.type}${schema.description ? ` - ${schema.description}` : ""}`, 1);
    }
  }
  out.newline();
  out.info(`Total: ${tools.length} tools.`);
}

export default listTools;
