/**
 * Codex adapter - OpenAI Responses API (`POST /responses`)
 */

import type { Logger } from "../../log.js";
import { KeyRotator, withKeyRotation } from "../key-rotator.js";
import { ProviderError } from "../provider-errors.js";
import {
  isJsonObject,
  type CompletionRequest,
  type JsonObject,
  type JsonValue,
  type LLMResponse,
  type ProviderAdapter,
  type ToolCall,
} from "../types.js";
import {
  arrayField,
  DEFAULT_REQUEST_TIMEOUT_MS,
  postJson,
  schemaToJson,
  stringField,
  trimBaseUrl,
} from "./http.js";

export const CODEX_PROVIDER = "codex";
export const CODEX_DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const CODEX_DEFAULT_MODEL = "gpt-5.2-codex";
export const CODEX_DEFAULT_REASONING_EFFORT = "medium";
export const CODEX_MODELS: readonly string[] = [
  "gpt-5.2-codex",
  "gpt-5.1-codex-mini",
  "gpt-5.1-codex-max",
  "gpt-5.1-codex",
  "gpt-5-codex",
  "gpt-5-codex-mini",
  "gpt-5.2",
  "gpt-5.1",
  "gpt-5",
];

export interface CodexAdapterOptions {
  apiKeys: string[];
  logger: Logger;
  baseUrl?: string;
  model?: string;
  reasoningEffort?: string;
  timeoutMs?: number;
}

export class CodexAdapter implements ProviderAdapter {
  readonly model: string;
  readonly reasoningEffort: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly rotator: KeyRotator;
  private readonly logger: Logger;

  constructor(options: CodexAdapterOptions) {
    this.baseUrl = trimBaseUrl(options.baseUrl || CODEX_DEFAULT_BASE_URL);
    this.model = options.model || CODEX_DEFAULT_MODEL;
    this.reasoningEffort = options.reasoningEffort || CODEX_DEFAULT_REASONING_EFFORT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rotator = new KeyRotator(options.apiKeys);
    this.logger = options.logger.child({ component: "provider", provider: CODEX_PROVIDER });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const model = request.model || this.model;
    if (!CODEX_MODELS.includes(model)) {
      throw new ProviderError(CODEX_PROVIDER, "unsupported_model", `model not allowed: ${model}`);
    }
    const payload = buildCodexPayload(request, model, request.reasoningEffort || this.reasoningEffort);

    return withKeyRotation({
      provider: CODEX_PROVIDER,
      rotator: this.rotator,
      logger: this.logger,
      signal,
      attempt: async (apiKey) => {
        const raw = await postJson({
          provider: CODEX_PROVIDER,
          url: `${this.baseUrl}/responses`,
          headers: { Authorization: `Bearer ${apiKey}` },
          payload,
          timeoutMs: this.timeoutMs,
          signal,
        });
        return { ...parseCodexResponse(raw), raw };
      },
    });
  }
}

export function buildCodexPayload(request: CompletionRequest, model: string, reasoningEffort: string): JsonObject {
  let instructions: string | undefined;
  const input: JsonObject[] = [];
  for (const msg of request.messages) {
    if (msg.role === "system") {
      instructions = msg.content;
    } else {
      input.push({ role: msg.role, content: msg.content });
    }
  }

  const payload: JsonObject = {
    model,
    input,
    stream: false,
    store: false,
    reasoning: { effort: reasoningEffort },
  };
  if (instructions !== undefined) payload.instructions = instructions;
  if (request.temperature !== undefined) payload.temperature = request.temperature;
  if (request.tools.length > 0) {
    payload.tools = request.tools.map((tool) => ({
      type: "function",
      name: tool.name,
      description: tool.description,
      parameters: schemaToJson(tool.parameters),
    }));
  }
  return payload;
}

export function parseCodexResponse(raw: JsonObject): { content: string; toolCalls: ToolCall[] } {
  let text = stringField(raw, "output_text") ?? "";
  const toolCalls: ToolCall[] = [];

  for (const item of arrayField(raw, "output")) {
    const type = stringField(item, "type");
    if (type === "function_call") {
      toolCalls.push({
        name: stringField(item, "name") ?? "",
        args: decodeArguments(item.arguments),
      });
      continue;
    }
    if (stringField(raw, "output_text")) continue;
    for (const part of arrayField(item, "content")) {
      const partType = stringField(part, "type");
      if (partType === "output_text" || partType === "text") {
        text += stringField(part, "text") ?? "";
      }
    }
  }

  return { content: text, toolCalls };
}

/** Arguments arrive as a JSON string; an object is accepted as-is. */
export function decodeArguments(value: JsonValue | undefined): JsonObject {
  if (isJsonObject(value)) return value;
  if (typeof value !== "string" || !value.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return isJsonObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
