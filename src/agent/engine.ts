/**
 * Agent Engine - the tool-calling execution loop
 *
 * One `execute` call: create a task, seed the conversation, then alternate
 * model calls with tool invocations until the model answers without tool
 * calls, the provider fails, or the iteration budget runs out. Every terminal
 * path updates the task exactly once and returns an AgentResult.
 *
 * `chat` runs the same loop over a conversation kept on the engine, without
 * tasks.
 */

import type { Logger } from "../log.js";
import type { Task, TaskUpdate } from "./task/types.js";
import type { TaskStore } from "./task/task-store.js";
import type { ToolRegistry } from "./tool-registry.js";
import type {
  AgentConfig,
  AgentResult,
  ChatOptions,
  CompletionRequest,
  ExecuteOptions,
  ExecuteOverrides,
  ExecutionTrace,
  LLMResponse,
  Message,
  ProviderAdapter,
  ToolCall,
  ToolHandler,
  ToolResult,
  ToolSchema,
} from "./types.js";

export const MAX_ITERATIONS_ERROR = "max iterations reached";

export const CHAT_MAX_ITERATIONS_REPLY = "(max iterations reached)";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export const DEFAULT_AGENT_CONFIG: Readonly<AgentConfig> = Object.freeze({
  provider: "gemini",
  model: "gemini-3-flash-preview",
  maxIterations: 10,
  temperature: 0.3,
  taskStoreEnabled: true,
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
});

export interface AgentEngineConfig {
  config: AgentConfig;
  logger: Logger;
  router: ProviderAdapter;
  toolRegistry: ToolRegistry;
  taskStore?: TaskStore;
}

interface EffectiveConfig extends Readonly<AgentConfig> {
  readonly debug: boolean;
}

/**
 * Base config plus per-call overrides, as a new frozen value. Empty strings
 * and undefined leave the base setting in place.
 */
export function resolveEffectiveConfig(base: AgentConfig, overrides: ExecuteOverrides = {}): EffectiveConfig {
  return Object.freeze({
    ...base,
    provider: overrides.provider || base.provider,
    model: overrides.model || base.model,
    temperature: overrides.temperature ?? base.temperature,
    systemPrompt: overrides.systemPrompt || base.systemPrompt,
    debug: overrides.debug ?? false,
  });
}

export class AgentEngine {
  private readonly config: Readonly<AgentConfig>;
  private readonly logger: Logger;
  private readonly router: ProviderAdapter;
  private readonly toolRegistry: ToolRegistry;
  private readonly taskStore?: TaskStore;
  private chatMessages: Message[] = [];
  private chatInFlight = false;

  constructor(params: AgentEngineConfig) {
    if (!Number.isInteger(params.config.maxIterations) || params.config.maxIterations <= 0) {
      throw new RangeError(`maxIterations must be a positive integer, got ${params.config.maxIterations}`);
    }
    this.config = Object.freeze({ ...params.config });
    this.logger = params.logger.child({ component: "engine" });
    this.router = params.router;
    this.toolRegistry = params.toolRegistry;
    this.taskStore = params.config.taskStoreEnabled ? params.taskStore : undefined;
  }

  getConfig(): Readonly<AgentConfig> {
    return this.config;
  }

  getTaskStore(): TaskStore | undefined {
    return this.taskStore;
  }

  addTool(name: string, handler: ToolHandler, schema: Partial<ToolSchema>): void {
    this.toolRegistry.register(name, handler, schema);
  }

  listTasks(limit = 0): Task[] {
    return this.taskStore?.list(limit) ?? [];
  }

  async execute(instruction: string, options: ExecuteOptions = {}): Promise<AgentResult> {
    const cfg = resolveEffectiveConfig(this.config, options.overrides);
    const startTime = Date.now();

    let taskId: string | undefined;
    if (this.taskStore) {
      try {
        taskId = (await this.taskStore.create(instruction)).id;
      } catch (err) {
        const error = `task store: ${errorMessage(err)}`;
        this.logger.error({ error }, "Failed to create task");
        return { success: false, output: "", error };
      }
    }

    this.logger.info(
      { taskId, provider: cfg.provider, model: cfg.model, maxIterations: cfg.maxIterations },
      "Execution started",
    );

    const messages: Message[] = [
      { role: "system", content: cfg.systemPrompt },
      { role: "user", content: instruction },
    ];
    const tools = this.toolRegistry.count > 0 ? this.toolRegistry.getSchemas() : [];
    const trace: ExecutionTrace | undefined = cfg.debug
      ? { provider: cfg.provider, model: cfg.model, iterations: 0, toolCalls: [], toolResults: [], raw: null }
      : undefined;

    const finish = async (result: AgentResult, update: TaskUpdate): Promise<AgentResult> => {
      const out: AgentResult = { ...result, taskId, ...(trace ? { trace } : {}) };
      if (this.taskStore && taskId) {
        try {
          await this.taskStore.update(taskId, update);
        } catch (err) {
          const error = `task store: ${errorMessage(err)}`;
          this.logger.error({ taskId, error }, "Failed to record task outcome");
          out.error = out.error ? `${out.error}; ${error}` : error;
        }
      }
      this.logger.info(
        { taskId, success: out.success, durationMs: Date.now() - startTime, error: out.error },
        "Execution finished",
      );
      return out;
    };

    for (let iteration = 1; iteration <= cfg.maxIterations; iteration++) {
      let response: LLMResponse;
      try {
        response = await this.router.complete(buildRequest(cfg, messages, tools), options.signal);
      } catch (err) {
        const error = errorMessage(err);
        this.logger.warn({ taskId, iteration, error }, "Model call failed");
        return finish({ success: false, output: "", error }, { status: "failed", error });
      }

      if (trace) {
        trace.iterations = iteration;
        trace.raw = response.raw;
        trace.toolCalls.push(...response.toolCalls);
      }

      if (response.toolCalls.length === 0) {
        return finish({ success: true, output: response.content }, { status: "completed", output: response.content });
      }

      messages.push({ role: "assistant", content: response.content });

      for (const call of response.toolCalls) {
        const result = await this.toolRegistry.execute(call.name, call.args, { signal: options.signal });
        trace?.toolResults.push({
          name: call.name,
          success: result.success,
          output: result.output,
          error: result.error,
        });
        if (result.final) {
          return finish({ success: true, output: result.output }, { status: "completed", output: result.output });
        }
        messages.push(toolResultMessage(call, result));
      }
    }

    return finish(
      { success: false, output: "", error: MAX_ITERATIONS_ERROR },
      { status: "failed", error: MAX_ITERATIONS_ERROR },
    );
  }

  /**
   * One turn of the engine's conversation. The history persists across calls
   * until `resetChat`; its system message is fixed by the first turn. Provider
   * errors reject. Turns must not overlap.
   */
  async chat(message: string, options: ChatOptions = {}): Promise<string> {
    if (this.chatInFlight) {
      throw new Error("chat turn already in progress");
    }
    this.chatInFlight = true;
    try {
      return await this.runChatTurn(message, options);
    } finally {
      this.chatInFlight = false;
    }
  }

  resetChat(): void {
    this.chatMessages = [];
  }

  get chatHistory(): Message[] {
    return this.chatMessages.map((msg) => ({ ...msg }));
  }

  private async runChatTurn(message: string, options: ChatOptions): Promise<string> {
    const cfg = resolveEffectiveConfig(this.config);
    if (this.chatMessages.length === 0) {
      this.chatMessages.push({ role: "system", content: options.systemPrompt || cfg.systemPrompt });
    }
    this.chatMessages.push({ role: "user", content: message });
    const tools = this.toolRegistry.count > 0 ? this.toolRegistry.getSchemas() : [];

    for (let iteration = 1; iteration <= cfg.maxIterations; iteration++) {
      const response = await this.router.complete(buildRequest(cfg, this.chatMessages, tools), options.signal);
      this.chatMessages.push({ role: "assistant", content: response.content });
      if (response.toolCalls.length === 0) {
        return response.content;
      }

      for (const call of response.toolCalls) {
        const result = await this.toolRegistry.execute(call.name, call.args, { signal: options.signal });
        this.chatMessages.push(toolResultMessage(call, result));
        if (result.final) {
          this.chatMessages.push({ role: "assistant", content: result.output });
          return result.output;
        }
      }
    }

    this.logger.warn({ maxIterations: cfg.maxIterations }, "Chat turn hit the iteration limit");
    return CHAT_MAX_ITERATIONS_REPLY;
  }
}

function buildRequest(cfg: EffectiveConfig, messages: Message[], tools: ToolSchema[]): CompletionRequest {
  return {
    messages: [...messages],
    tools,
    temperature: cfg.temperature,
    model: cfg.model,
    provider: cfg.provider,
    reasoningEffort: cfg.reasoningEffort,
  };
}

function toolResultMessage(call: ToolCall, result: ToolResult): Message {
  return {
    role: "user",
    content: result.success ? `Tool ${call.name} result: ${result.output}` : `Tool ${call.name} error: ${result.error}`,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
