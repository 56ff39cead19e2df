import { afterEach, describe, it, expect, vi } from "vitest";

import { buildOpusPayload, OpusAdapter, parseOpusResponse } from "../../../../src/agent/adapters/opus.js";
import type { CompletionRequest } from "../../../../src/agent/types.js";
import { jsonResponse, requestBody, requestHeaders, silentLogger, stubFetch } from "../../../helpers.js";

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    messages: [
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
    ],
    tools: [],
    model: "",
    provider: "opus",
    ...overrides,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("buildOpusPayload", () => {
  it("keeps messages as-is and omits an empty model", () => {
    expect(buildOpusPayload(request(), "", 0.3)).toEqual({
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "hi" },
      ],
      temperature: 0.3,
    });
  });

  it("adds model and tools when present", () => {
    const payload = buildOpusPayload(
      request({ tools: [{ name: "bash", description: "Run", parameters: { type: "object" } }] }),
      "opus-large",
      0,
    );

    expect(payload.model).toBe("opus-large");
    expect(payload.temperature).toBe(0);
    expect(payload.tools).toEqual([{ name: "bash", description: "Run", parameters: { type: "object" } }]);
  });
});

describe("parseOpusResponse", () => {
  it("reads output_text before text and content", () => {
    expect(parseOpusResponse({ output_text: "a", text: "b", content: "c" }).content).toBe("a");
    expect(parseOpusResponse({ text: "b", content: "c" }).content).toBe("b");
    expect(parseOpusResponse({ content: "c" }).content).toBe("c");
    expect(parseOpusResponse({}).content).toBe("");
  });

  it("decodes tool call arguments given as strings or objects", () => {
    const parsed = parseOpusResponse({
      tool_calls: [
        { name: "read_file", arguments: '{"path":"a.txt"}' },
        { name: "list_dir", arguments: { path: "." } },
        "not an object",
      ],
    });

    expect(parsed.toolCalls).toEqual([
      { name: "read_file", args: { path: "a.txt" } },
      { name: "list_dir", args: { path: "." } },
    ]);
  });
});

describe("OpusAdapter", () => {
  it("joins base URL and endpoint", async () => {
    const fetchMock = stubFetch(() => jsonResponse(200, { text: "pong" }));
    const adapter = new OpusAdapter({
      apiKeys: ["test-key-1"],
      baseUrl: "http://opus.test/api/",
      endpoint: "chat",
      logger: silentLogger,
      model: "opus-large",
    });

    const response = await adapter.complete(request({ temperature: 0.9 }));

    expect(response.content).toBe("pong");
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://opus.test/api/chat");
    expect(requestHeaders(call?.[1]).Authorization).toBe("Bearer test-key-1");
    expect(requestBody(call?.[1])).toMatchObject({ model: "opus-large", temperature: 0.9 });
  });

  it("defaults to the /responses endpoint", async () => {
    const fetchMock = stubFetch(() => jsonResponse(200, { text: "pong" }));
    const adapter = new OpusAdapter({ apiKeys: ["test-key-1"], baseUrl: "http://opus.test", logger: silentLogger });

    await adapter.complete(request());

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://opus.test/responses");
  });

  it("tries every key before failing", async () => {
    const fetchMock = stubFetch(() => jsonResponse(403, "denied"));
    const adapter = new OpusAdapter({
      apiKeys: ["test-key-1", "test-key-2", "test-key-3"],
      baseUrl: "http://opus.test",
      logger: silentLogger,
    });

    await expect(adapter.complete(request())).rejects.toThrow("opus: auth error: denied");
    expect(fetchMock.mock.calls.map((call) => requestHeaders(call[1]).Authorization)).toEqual([
      "Bearer test-key-1",
      "Bearer test-key-2",
      "Bearer test-key-3",
    ]);
  });
});
