/**
 * Opus adapter - generic chat-style endpoint behind a configurable base URL
 */

import type { Logger } from "../../log.js";
import { KeyRotator, withKeyRotation } from "../key-rotator.js";
import type { CompletionRequest, JsonObject, LLMResponse, ProviderAdapter, ToolCall } from "../types.js";
import { decodeArguments } from "./codex.js";
import {
  arrayField,
  DEFAULT_REQUEST_TIMEOUT_MS,
  postJson,
  schemaToJson,
  stringField,
  trimBaseUrl,
} from "./http.js";

export const OPUS_PROVIDER = "opus";
export const OPUS_DEFAULT_ENDPOINT = "/responses";

export interface OpusAdapterOptions {
  apiKeys: string[];
  baseUrl: string;
  logger: Logger;
  endpoint?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class OpusAdapter implements ProviderAdapter {
  readonly model: string;
  readonly temperature: number;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly rotator: KeyRotator;
  private readonly logger: Logger;

  constructor(options: OpusAdapterOptions) {
    const endpoint = options.endpoint || OPUS_DEFAULT_ENDPOINT;
    this.url = `${trimBaseUrl(options.baseUrl)}${endpoint.startsWith("/") ? endpoint : `/${endpoint}`}`;
    this.model = options.model ?? "";
    this.temperature = options.temperature ?? 0.3;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rotator = new KeyRotator(options.apiKeys);
    this.logger = options.logger.child({ component: "provider", provider: OPUS_PROVIDER });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const payload = buildOpusPayload(request, request.model || this.model, request.temperature ?? this.temperature);

    return withKeyRotation({
      provider: OPUS_PROVIDER,
      rotator: this.rotator,
      logger: this.logger,
      signal,
      attempt: async (apiKey) => {
        const raw = await postJson({
          provider: OPUS_PROVIDER,
          url: this.url,
          headers: { Authorization: `Bearer ${apiKey}` },
          payload,
          timeoutMs: this.timeoutMs,
          signal,
        });
        return { ...parseOpusResponse(raw), raw };
      },
    });
  }
}

export function buildOpusPayload(request: CompletionRequest, model: string, temperature: number): JsonObject {
  const payload: JsonObject = {
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    temperature,
  };
  if (model) payload.model = model;
  if (request.tools.length > 0) {
    payload.tools = request.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: schemaToJson(tool.parameters),
    }));
  }
  return payload;
}

export function parseOpusResponse(raw: JsonObject): { content: string; toolCalls: ToolCall[] } {
  const content =
    stringField(raw, "output_text") ?? stringField(raw, "text") ?? stringField(raw, "content") ?? "";
  const toolCalls = arrayField(raw, "tool_calls").map((call) => ({
    name: stringField(call, "name") ?? "",
    args: decodeArguments(call.arguments),
  }));
  return { content, toolCalls };
}
