/**
 * Agent Module - engine, provider routing, tools and tasks
 */

// Bootstrap
export { createAgent, type CreateAgentParams } from "./create-agent.js";

// Core Engine
export {
  AgentEngine,
  CHAT_MAX_ITERATIONS_REPLY,
  DEFAULT_AGENT_CONFIG,
  DEFAULT_SYSTEM_PROMPT,
  MAX_ITERATIONS_ERROR,
  resolveEffectiveConfig,
  type AgentEngineConfig,
} from "./engine.js";

// Tool System
export {
  ToolRegistry,
  ToolArgumentError,
  ToolRegistrationError,
  FinalResultSignal,
  defineTool,
  defineParams,
} from "./tool-registry.js";

// Workers
export {
  WorkerSpawner,
  registerWorkerTools,
  type WorkerRequest,
  type WorkerSettings,
} from "./subagent/worker-spawner.js";

// Provider System
export { LLMRouter } from "./router.js";
export { KeyRotator, withKeyRotation } from "./key-rotator.js";
export {
  ProviderError,
  ProviderNotRegisteredError,
  classifyHttpFailure,
  isProviderError,
  type ProviderErrorKind,
} from "./provider-errors.js";
export { GeminiAdapter, GEMINI_MODELS } from "./adapters/gemini.js";
export { CodexAdapter, CODEX_MODELS } from "./adapters/codex.js";
export { OpusAdapter } from "./adapters/opus.js";

// Tasks
export {
  TaskStore,
  TaskNotFoundError,
  TaskFileError,
  TaskTransitionError,
  toTaskRecord,
} from "./task/task-store.js";
export type { Task, TaskRecord, TaskStatus, TaskUpdate } from "./task/types.js";

export type * from "./types.js";
