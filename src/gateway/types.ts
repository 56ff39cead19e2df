import { z } from "zod";

import type { JsonObject } from "../agent/types.js";
import type { TaskRecord } from "../agent/task/types.js";

export const ExecuteRequestSchema = z.object({
  instruction: z.string().optional(),
  system_prompt: z.string().optional(),
  provider: z.string().optional(),
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  debug: z.boolean().optional(),
});

export type ExecuteRequest = z.infer<typeof ExecuteRequestSchema>;

export interface WireToolCall {
  name: string;
  args: JsonObject;
}

export interface WireTrace {
  provider: string;
  model: string;
  iterations: number;
  tool_calls: WireToolCall[];
  tool_results: Array<{ name: string; success: boolean; output: string; error: string }>;
  raw: JsonObject | null;
}

export interface ExecuteResponse {
  success: boolean;
  output: string;
  task_id?: string;
  trace?: WireTrace;
  error?: string;
}

export interface HealthResponse {
  status: "ok";
  version: string;
}

export interface TasksResponse {
  tasks: TaskRecord[];
}

export interface ErrorResponse {
  error: string;
}
