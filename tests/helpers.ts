import { vi } from "vitest";

import type { CompletionRequest, JsonObject, LLMResponse, ProviderAdapter } from "../src/agent/types.js";
import { createSilentLogger } from "../src/log.js";

export const silentLogger = createSilentLogger();

type Step = LLMResponse | Error;

/**
 * Provider double that replays a script of responses. The last step repeats
 * once the script runs out.
 */
export class ScriptedProvider implements ProviderAdapter {
  readonly requests: CompletionRequest[] = [];
  private readonly steps: Step[];

  constructor(steps: Step[]) {
    this.steps = steps;
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const step = this.steps[Math.min(this.requests.length - 1, this.steps.length - 1)];
    if (!step) throw new Error("empty script");
    if (step instanceof Error) throw step;
    return step;
  }
}

export function textResponse(content: string): LLMResponse {
  return { content, toolCalls: [], raw: { text: content } };
}

export function toolResponse(name: string, args: JsonObject, content = ""): LLMResponse {
  return { content, toolCalls: [{ name, args }], raw: { tool: name } };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function geminiText(text: string): JsonObject {
  return { candidates: [{ content: { role: "model", parts: [{ text }] } }] };
}

/**
 * Stub global fetch with a handler; returns the mock for call inspection.
 */
export function stubFetch(handler: (url: string, init: RequestInit) => Response | Promise<Response>) {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => handler(String(input), init ?? {}));
  vi.stubGlobal("fetch", mock);
  return mock;
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

export function requestHeaders(init: RequestInit | undefined): Record<string, string> {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return {};
  return headers;
}
