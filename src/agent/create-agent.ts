/**
 * Agent bootstrap - wires adapters, tools and the task store into an engine
 */

import { ConfigError, type Env, loadKeysFromEnv, type ToolloopConfig } from "../config.js";
import type { Logger } from "../log.js";
import { registerBuiltins } from "../tools/built-in/index.js";
import { CODEX_PROVIDER, CodexAdapter } from "./adapters/codex.js";
import { GEMINI_PROVIDER, GeminiAdapter } from "./adapters/gemini.js";
import { OPUS_PROVIDER, OpusAdapter } from "./adapters/opus.js";
import { AgentEngine, DEFAULT_SYSTEM_PROMPT } from "./engine.js";
import { LLMRouter } from "./router.js";
import { registerWorkerTools, WorkerSpawner } from "./subagent/worker-spawner.js";
import { TaskStore } from "./task/task-store.js";
import { ToolRegistry } from "./tool-registry.js";

export interface CreateAgentParams {
  config: ToolloopConfig;
  env?: Env;
  logger: Logger;
}

/**
 * Build the engine once at startup. Adapters are registered only for
 * providers that have credentials; the selected provider must be one of them.
 */
export async function createAgent(params: CreateAgentParams): Promise<AgentEngine> {
  const { config, logger } = params;
  const env = params.env ?? process.env;
  const agentCfg = config.agent;

  const router = new LLMRouter({ defaultProvider: agentCfg.provider, logger });

  const geminiKeys = loadKeysFromEnv(GEMINI_PROVIDER, env);
  if (geminiKeys.length > 0) {
    router.registerProvider(
      GEMINI_PROVIDER,
      new GeminiAdapter({
        apiKeys: geminiKeys,
        logger,
        baseUrl: config.providers.gemini.baseUrl,
        model: agentCfg.provider === GEMINI_PROVIDER ? agentCfg.model : undefined,
        temperature: agentCfg.temperature,
        timeoutMs: config.providers.gemini.timeoutMs,
      }),
    );
  }

  const codexKeys = loadKeysFromEnv(CODEX_PROVIDER, env);
  if (codexKeys.length > 0) {
    router.registerProvider(
      CODEX_PROVIDER,
      new CodexAdapter({
        apiKeys: codexKeys,
        logger,
        baseUrl: config.providers.codex.baseUrl,
        model: agentCfg.provider === CODEX_PROVIDER ? agentCfg.model : undefined,
        reasoningEffort: agentCfg.reasoningEffort,
        timeoutMs: config.providers.codex.timeoutMs,
      }),
    );
  }

  const opusKeys = loadKeysFromEnv(OPUS_PROVIDER, env);
  const opusBaseUrl = env.OPUS_BASE_URL?.trim() || config.providers.opus.baseUrl;
  if (opusKeys.length > 0 && opusBaseUrl) {
    router.registerProvider(
      OPUS_PROVIDER,
      new OpusAdapter({
        apiKeys: opusKeys,
        baseUrl: opusBaseUrl,
        logger,
        endpoint: env.OPUS_ENDPOINT?.trim() || config.providers.opus.endpoint,
        model: agentCfg.provider === OPUS_PROVIDER ? agentCfg.model : undefined,
        temperature: agentCfg.temperature,
        timeoutMs: config.providers.opus.timeoutMs,
      }),
    );
  } else if (opusKeys.length > 0) {
    logger.warn("OPUS_API_KEY set without OPUS_BASE_URL; opus provider disabled");
  }

  if (!router.has(agentCfg.provider)) {
    throw new ConfigError(`no credentials configured for provider: ${agentCfg.provider}`);
  }

  const toolRegistry = new ToolRegistry({ logger });
  if (config.tools.builtins) {
    registerBuiltins(toolRegistry, { workspaceDir: config.resolved.workspaceDir, logger });
  }

  if (config.workers.enabled) {
    registerWorkerTools(toolRegistry, createWorkerSpawner(config, router, logger));
  }

  const taskStore = config.tasks.enabled
    ? await TaskStore.open({ logger, persist: config.tasks.persist, filePath: config.resolved.tasksFilePath })
    : undefined;

  logger.info(
    {
      provider: agentCfg.provider,
      model: agentCfg.model,
      providers: router.providerNames(),
      tools: toolRegistry.count,
      tasks: config.tasks.enabled,
      workers: config.workers.enabled,
    },
    "Agent created",
  );

  return new AgentEngine({
    config: {
      provider: agentCfg.provider,
      model: agentCfg.model,
      reasoningEffort: agentCfg.reasoningEffort,
      maxIterations: agentCfg.maxIterations,
      temperature: agentCfg.temperature,
      taskStoreEnabled: config.tasks.enabled,
      systemPrompt: agentCfg.systemPrompt || DEFAULT_SYSTEM_PROMPT,
    },
    logger,
    router,
    toolRegistry,
    taskStore,
  });
}

/**
 * Workers get the built-ins on a registry of their own, so the spawn tools
 * registered on the parent are out of their reach.
 */
function createWorkerSpawner(config: ToolloopConfig, router: LLMRouter, logger: Logger): WorkerSpawner {
  const workersCfg = config.workers;
  const provider = workersCfg.provider ?? config.agent.provider;
  if (!router.has(provider)) {
    throw new ConfigError(`no credentials configured for worker provider: ${provider}`);
  }

  const workerTools = new ToolRegistry({ logger });
  if (config.tools.builtins) {
    registerBuiltins(workerTools, { workspaceDir: config.resolved.workspaceDir, logger });
  }

  return new WorkerSpawner({
    router,
    toolRegistry: workerTools,
    settings: {
      provider,
      model: workersCfg.model ?? "",
      reasoningEffort: provider === config.agent.provider ? config.agent.reasoningEffort : undefined,
      maxIterations: workersCfg.maxIterations,
      temperature: config.agent.temperature,
      systemPrompt: workersCfg.systemPrompt,
    },
    logger,
  });
}
