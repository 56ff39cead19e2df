import { z } from "zod";

import type { Logger } from "../../log.js";
import { AgentEngine, DEFAULT_SYSTEM_PROMPT } from "../engine.js";
import { defineParams, ToolArgumentError, type ToolRegistry } from "../tool-registry.js";
import type { AgentResult, JsonObject, ProviderAdapter, ProviderName } from "../types.js";

export interface WorkerSettings {
  provider: ProviderName;
  /** Empty lets the adapter pick its default model. */
  model: string;
  reasoningEffort?: string;
  maxIterations: number;
  temperature: number;
  systemPrompt?: string;
}

export interface WorkerRequest {
  instruction: string;
  context?: string;
  systemPrompt?: string;
}

/**
 * Worker Spawner - runs delegated instructions on disposable engines
 *
 * Workers share the parent's router (and so its key rotation), use their own
 * tool registry and never track tasks. The registry handed in must not carry
 * the worker tools, so workers cannot spawn further workers.
 */
export class WorkerSpawner {
  private readonly router: ProviderAdapter;
  private readonly toolRegistry: ToolRegistry;
  private readonly settings: Readonly<WorkerSettings>;
  private readonly logger: Logger;
  private counter = 0;

  constructor(params: {
    router: ProviderAdapter;
    toolRegistry: ToolRegistry;
    settings: WorkerSettings;
    logger: Logger;
  }) {
    this.router = params.router;
    this.toolRegistry = params.toolRegistry;
    this.settings = Object.freeze({ ...params.settings });
    this.logger = params.logger.child({ component: "workers" });
  }

  async spawn(request: WorkerRequest, signal?: AbortSignal): Promise<AgentResult> {
    this.counter++;
    const workerId = `worker-${this.counter}`;
    const worker = new AgentEngine({
      config: {
        provider: this.settings.provider,
        model: this.settings.model,
        reasoningEffort: this.settings.reasoningEffort,
        maxIterations: this.settings.maxIterations,
        temperature: this.settings.temperature,
        taskStoreEnabled: false,
        systemPrompt: request.systemPrompt || this.settings.systemPrompt || DEFAULT_SYSTEM_PROMPT,
      },
      logger: this.logger.child({ workerId }),
      router: this.router,
      toolRegistry: this.toolRegistry,
    });

    this.logger.info({ workerId, instruction: request.instruction.slice(0, 100) }, "Worker spawned");
    const result = await worker.execute(workerInstruction(request), { signal });
    this.logger.info({ workerId, success: result.success }, "Worker finished");
    return result;
  }

  /**
   * Runs every request concurrently; results come back in request order.
   */
  spawnAll(requests: WorkerRequest[], signal?: AbortSignal): Promise<AgentResult[]> {
    return Promise.all(requests.map((request) => this.spawn(request, signal)));
  }
}

export function workerInstruction(request: WorkerRequest): string {
  return request.context ? `Context: ${request.context}\n\nTask: ${request.instruction}` : request.instruction;
}

const SpawnWorkerArgs = z.object({
  instruction: z.string().min(1),
  context: z.string().optional(),
  system_prompt: z.string().optional(),
});

const BatchItem = z.union([
  z.string().min(1).transform((instruction) => ({ instruction })),
  SpawnWorkerArgs,
]);

const BatchSchema = z.array(BatchItem).min(1);

/**
 * Register `spawn_worker` and `spawn_workers` on the parent's registry
 */
export function registerWorkerTools(registry: ToolRegistry, spawner: WorkerSpawner): void {
  registry.register(
    "spawn_worker",
    async (args, ctx) => {
      const parsed = SpawnWorkerArgs.safeParse(args);
      if (!parsed.success) {
        throw new ToolArgumentError(`spawn_worker: ${issueText(parsed.error)}`);
      }
      const { instruction, context, system_prompt: systemPrompt } = parsed.data;
      const result = await spawner.spawn({ instruction, context, systemPrompt }, ctx.signal);
      if (!result.success) {
        throw new Error(`worker failed: ${result.error ?? "unknown error"}`);
      }
      return result.output;
    },
    {
      description:
        "Spawn a worker agent for a self-contained task. The worker has its own context, " +
        "runs the task and returns its result.",
      parameters: defineParams(
        {
          instruction: { type: "string", description: "Clear, specific instruction for the worker" },
          context: { type: "string", description: "Relevant context to pass to the worker" },
          system_prompt: { type: "string", description: "Custom system prompt for the worker" },
        },
        ["instruction"],
      ),
    },
  );

  registry.register(
    "spawn_workers",
    async (args, ctx) => {
      const requests = parseBatch(args);
      const results = await spawner.spawnAll(requests, ctx.signal);
      return formatBatch(requests, results);
    },
    {
      description:
        "Spawn several workers in parallel. Pass a JSON array of objects with 'instruction' " +
        "and optional 'context' and 'system_prompt' fields.",
      parameters: defineParams(
        {
          tasks: {
            type: "string",
            description: 'JSON array: [{"instruction": "...", "context": "..."}, ...]',
          },
        },
        ["tasks"],
      ),
    },
  );
}

function parseBatch(args: JsonObject): WorkerRequest[] {
  let tasks: unknown = args.tasks;
  if (typeof tasks === "string") {
    try {
      tasks = JSON.parse(tasks);
    } catch {
      throw new ToolArgumentError("spawn_workers: invalid tasks: not valid JSON");
    }
  }
  const parsed = BatchSchema.safeParse(tasks);
  if (!parsed.success) {
    throw new ToolArgumentError(`spawn_workers: ${issueText(parsed.error, "tasks")}`);
  }
  return parsed.data.map((item) => ({
    instruction: item.instruction,
    context: "context" in item ? item.context : undefined,
    systemPrompt: "system_prompt" in item ? item.system_prompt : undefined,
  }));
}

/**
 * `[worker N] <instruction>` followed by the worker's output (or failure),
 * one block per request, blank line between blocks.
 */
export function formatBatch(requests: WorkerRequest[], results: AgentResult[]): string {
  const blocks = requests.map((request, i) => {
    const result = results[i];
    const body = !result
      ? "[no result]"
      : result.success
        ? result.output
        : `[worker failed] ${result.error ?? "unknown error"}`;
    return `[worker ${i + 1}] ${request.instruction}\n${body}`;
  });
  return blocks.join("\n\n");
}

function issueText(error: z.ZodError, prefix?: string): string {
  const issue = error.issues[0];
  const field = [prefix, ...(issue?.path ?? [])].filter((part) => part !== undefined && part !== "").join(".");
  return `invalid ${field || "arguments"}: ${issue?.message ?? "invalid"}`;
}
