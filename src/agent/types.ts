/**
 * Core Types for the toolloop execution engine
 *
 * Shared by the engine loop, the provider adapters, the router and the
 * tool registry.
 */

// ============================================================================
// JSON Values
// ============================================================================

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Message Types
// ============================================================================

export type MessageRole = "system" | "user" | "assistant";

/**
 * One turn of the conversation. Append-only within a single execute call.
 */
export interface Message {
  role: MessageRole;
  content: string;
}

// ============================================================================
// Tool Types
// ============================================================================

/**
 * JSON Schema subset used for tool parameters
 */
export interface JSONSchema {
  type: string;
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  description?: string;
  enum?: string[];
  default?: JsonValue;
}

/**
 * Tool description advertised to the model. `name` always equals the
 * registry key it is stored under.
 */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: JSONSchema;
}

/**
 * Tool call requested by the model
 */
export interface ToolCall {
  name: string;
  args: JsonObject;
}

/**
 * Uniform tool outcome, whatever the handler does. `final` marks the
 * answer that ends the run.
 */
export interface ToolResult {
  success: boolean;
  output: string;
  error: string;
  final?: boolean;
}

/**
 * Tool handler. Returns the output text; throwing (or rejecting) marks the
 * call as failed with the error's message.
 */
export type ToolHandler = (args: JsonObject, ctx: ToolContext) => Promise<string> | string;

export interface ToolContext {
  signal?: AbortSignal;
}

/**
 * A tool declared together with its schema. `C` is the context the tool's
 * owner supplies on top of the registry's ToolContext.
 */
export interface ToolDefinition<C extends ToolContext = ToolContext> {
  meta: {
    name: string;
    description: string;
  };
  parameters: JSONSchema;
  execute(args: JsonObject, ctx: C): Promise<string>;
}

// ============================================================================
// Provider Types
// ============================================================================

export type ProviderName = string;

/**
 * Provider-agnostic completion request
 */
export interface CompletionRequest {
  messages: Message[];
  tools: ToolSchema[];
  /** Overrides the adapter's default temperature when set. */
  temperature?: number;
  /** Overrides the adapter's default model when non-empty. */
  model: string;
  /** Router falls back to its default provider when empty. */
  provider: ProviderName;
  reasoningEffort?: string;
}

/**
 * Normalized model response
 */
export interface LLMResponse {
  content: string;
  toolCalls: ToolCall[];
  raw: JsonObject;
}

/**
 * One backend. Implementations translate the request into their wire format,
 * rotate over their own keys and classify failures as ProviderError.
 */
export interface ProviderAdapter {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse>;
}

// ============================================================================
// Agent Types
// ============================================================================

/**
 * Engine settings. Frozen for the duration of one execute call.
 */
export interface AgentConfig {
  provider: ProviderName;
  model: string;
  reasoningEffort?: string;
  maxIterations: number;
  temperature: number;
  taskStoreEnabled: boolean;
  systemPrompt: string;
}

/**
 * Per-request settings. Applied to a derived copy of the engine config,
 * never to the shared one.
 */
export interface ExecuteOverrides {
  systemPrompt?: string;
  provider?: ProviderName;
  model?: string;
  temperature?: number;
  debug?: boolean;
}

export interface ExecuteOptions {
  overrides?: ExecuteOverrides;
  signal?: AbortSignal;
}

export interface ChatOptions {
  /** Used only when the turn opens a new conversation. */
  systemPrompt?: string;
  signal?: AbortSignal;
}

export interface ToolResultTrace {
  name: string;
  success: boolean;
  output: string;
  error: string;
}

/**
 * Diagnostic payload returned when debug is requested
 */
export interface ExecutionTrace {
  provider: ProviderName;
  model: string;
  iterations: number;
  toolCalls: ToolCall[];
  toolResults: ToolResultTrace[];
  raw: JsonObject | null;
}

/**
 * Output from the engine. Every terminal outcome produces one of these.
 */
export interface AgentResult {
  success: boolean;
  output: string;
  taskId?: string;
  error?: string;
  trace?: ExecutionTrace;
}
