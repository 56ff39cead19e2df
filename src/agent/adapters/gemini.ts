/**
 * Gemini adapter - reference backend (`generateContent` REST API)
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
  type Message,
  type ProviderAdapter,
  type ToolCall,
  type ToolSchema,
} from "../types.js";
import {
  arrayField,
  DEFAULT_REQUEST_TIMEOUT_MS,
  postJson,
  schemaToJson,
  stringField,
  trimBaseUrl,
} from "./http.js";

export const GEMINI_PROVIDER = "gemini";
export const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com";
export const GEMINI_DEFAULT_MODEL = "gemini-3-flash-preview";
export const GEMINI_MODELS: readonly string[] = ["gemini-3-flash-preview", "gemini-3-pro-preview"];

export interface GeminiAdapterOptions {
  apiKeys: string[];
  logger: Logger;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class GeminiAdapter implements ProviderAdapter {
  readonly model: string;
  readonly temperature: number;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly rotator: KeyRotator;
  private readonly logger: Logger;

  constructor(options: GeminiAdapterOptions) {
    this.baseUrl = trimBaseUrl(options.baseUrl || GEMINI_DEFAULT_BASE_URL);
    this.model = options.model || GEMINI_DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.3;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rotator = new KeyRotator(options.apiKeys);
    this.logger = options.logger.child({ component: "provider", provider: GEMINI_PROVIDER });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const model = request.model || this.model;
    if (!GEMINI_MODELS.includes(model)) {
      throw new ProviderError(GEMINI_PROVIDER, "unsupported_model", `model not allowed: ${model}`);
    }
    const temperature = request.temperature ?? this.temperature;
    const payload = buildGeminiPayload(request.messages, request.tools, temperature);
    const url = `${this.baseUrl}/v1beta/models/${model}:generateContent`;

    this.logger.debug(
      { model, messageCount: request.messages.length, toolCount: request.tools.length, temperature },
      "Gemini completion started",
    );

    const response = await withKeyRotation({
      provider: GEMINI_PROVIDER,
      rotator: this.rotator,
      logger: this.logger,
      signal,
      attempt: async (apiKey) => {
        const raw = await postJson({
          provider: GEMINI_PROVIDER,
          url,
          headers: { "x-goog-api-key": apiKey },
          payload,
          timeoutMs: this.timeoutMs,
          signal,
        });
        return { ...parseGeminiResponse(raw), raw };
      },
    });

    this.logger.debug(
      { model, toolCallCount: response.toolCalls.length, contentLength: response.content.length },
      "Gemini completion finished",
    );
    return response;
  }
}

/**
 * System messages go to `systemInstruction` (the last one wins); `user` stays
 * `user` and every other role becomes `model`.
 */
export function buildGeminiPayload(messages: Message[], tools: ToolSchema[], temperature: number): JsonObject {
  const contents: JsonValue[] = [];
  let systemInstruction: string | undefined;

  for (const msg of messages) {
    if (msg.role === "system") {
      systemInstruction = msg.content;
      continue;
    }
    contents.push({
      role: msg.role === "user" ? "user" : "model",
      parts: [{ text: msg.content }],
    });
  }

  const payload: JsonObject = {
    contents,
    generationConfig: { temperature },
  };

  if (systemInstruction) {
    payload.systemInstruction = { parts: [{ text: systemInstruction }] };
  }

  if (tools.length > 0) {
    payload.tools = [
      {
        functionDeclarations: tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          parameters: schemaToJson(tool.parameters),
        })),
      },
    ];
  }

  return payload;
}

export function parseGeminiResponse(raw: JsonObject): { content: string; toolCalls: ToolCall[] } {
  const first = arrayField(raw, "candidates")[0];
  const content = first?.content;
  if (!isJsonObject(content)) {
    return { content: "", toolCalls: [] };
  }

  let text = "";
  const toolCalls: ToolCall[] = [];
  for (const part of arrayField(content, "parts")) {
    const chunk = stringField(part, "text");
    if (chunk !== undefined) text += chunk;

    const fc = part.functionCall;
    if (isJsonObject(fc)) {
      toolCalls.push({
        name: stringField(fc, "name") ?? "",
        args: isJsonObject(fc.args) ? fc.args : {},
      });
    }
  }

  return { content: text, toolCalls };
}
