/**
 * Give Result Tool - Deliver the final answer and end the run
 */

import { z } from "zod";

import { defineParams, defineTool, FinalResultSignal } from "../../../agent/tool-registry.js";
import { type BuiltinToolContext, parseArgs } from "../context.js";

const ArgsSchema = z.object({
  result: z.string(),
});

export default defineTool<BuiltinToolContext>({
  meta: {
    name: "give_result",
    description: "Deliver your final answer to the user. The task ends as soon as this tool is called.",
  },
  parameters: defineParams(
    {
      result: { type: "string", description: "The final result to show the user" },
    },
    ["result"],
  ),
  async execute(args) {
    const { result } = parseArgs("give_result", ArgsSchema, args);
    throw new FinalResultSignal(result);
  },
});
