import { afterEach, describe, it, expect, vi } from "vitest";

import {
  buildGeminiPayload,
  GeminiAdapter,
  parseGeminiResponse,
} from "../../../../src/agent/adapters/gemini.js";
import { ProviderError } from "../../../../src/agent/provider-errors.js";
import type { CompletionRequest, ToolSchema } from "../../../../src/agent/types.js";
import { geminiText, jsonResponse, requestBody, requestHeaders, silentLogger, stubFetch } from "../../../helpers.js";

const echoTool: ToolSchema = {
  name: "echo",
  description: "Echo text back",
  parameters: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
};

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    messages: [
      { role: "system", content: "Be brief." },
      { role: "user", content: "hello" },
    ],
    tools: [],
    model: "",
    provider: "gemini",
    ...overrides,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("buildGeminiPayload", () => {
  it("maps roles and lifts the system message", () => {
    const payload = buildGeminiPayload(
      [
        { role: "system", content: "first" },
        { role: "user", content: "q" },
        { role: "assistant", content: "a" },
        { role: "system", content: "second" },
      ],
      [],
      0.2,
    );

    expect(payload).toEqual({
      contents: [
        { role: "user", parts: [{ text: "q" }] },
        { role: "model", parts: [{ text: "a" }] },
      ],
      generationConfig: { temperature: 0.2 },
      systemInstruction: { parts: [{ text: "second" }] },
    });
  });

  it("declares tools only when there are some", () => {
    const withTools = buildGeminiPayload([{ role: "user", content: "q" }], [echoTool], 0.3);
    const without = buildGeminiPayload([{ role: "user", content: "q" }], [], 0.3);

    expect(withTools.tools).toEqual([
      {
        functionDeclarations: [
          {
            name: "echo",
            description: "Echo text back",
            parameters: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
          },
        ],
      },
    ]);
    expect(without).not.toHaveProperty("tools");
    expect(without).not.toHaveProperty("systemInstruction");
  });
});

describe("parseGeminiResponse", () => {
  it("concatenates text parts and collects function calls", () => {
    const parsed = parseGeminiResponse({
      candidates: [
        {
          content: {
            parts: [
              { text: "Let me " },
              { text: "check." },
              { functionCall: { name: "echo", args: { text: "hi" } } },
            ],
          },
        },
      ],
    });

    expect(parsed).toEqual({ content: "Let me check.", toolCalls: [{ name: "echo", args: { text: "hi" } }] });
  });

  it("returns an empty response when there are no candidates", () => {
    expect(parseGeminiResponse({})).toEqual({ content: "", toolCalls: [] });
  });
});

describe("GeminiAdapter", () => {
  it("posts generateContent with the key header", async () => {
    const fetchMock = stubFetch(() => jsonResponse(200, geminiText("hi there")));
    const adapter = new GeminiAdapter({
      apiKeys: ["test-key-1"],
      logger: silentLogger,
      baseUrl: "http://gemini.test/",
    });

    const response = await adapter.complete(request({ temperature: 0.5 }));

    expect(response.content).toBe("hi there");
    expect(response.toolCalls).toEqual([]);
    expect(response.raw).toEqual(geminiText("hi there"));

    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("http://gemini.test/v1beta/models/gemini-3-flash-preview:generateContent");
    expect(init?.method).toBe("POST");
    expect(requestHeaders(init)).toEqual({ "Content-Type": "application/json", "x-goog-api-key": "test-key-1" });
    expect(requestBody(init)).toEqual({
      contents: [{ role: "user", parts: [{ text: "hello" }] }],
      generationConfig: { temperature: 0.5 },
      systemInstruction: { parts: [{ text: "Be brief." }] },
    });
  });

  it("uses the adapter temperature when the request has none", async () => {
    const fetchMock = stubFetch(() => jsonResponse(200, geminiText("ok")));
    const adapter = new GeminiAdapter({ apiKeys: ["test-key-1"], logger: silentLogger, temperature: 0.7 });

    await adapter.complete(request());

    expect(requestBody(fetchMock.mock.calls[0]?.[1])).toMatchObject({ generationConfig: { temperature: 0.7 } });
  });

  it("rotates to the next key after a rate limit", async () => {
    const fetchMock = stubFetch((_url, init) =>
      requestHeaders(init)["x-goog-api-key"] === "test-key-1"
        ? jsonResponse(429, "Quota exceeded")
        : jsonResponse(200, geminiText("second key worked")),
    );
    const adapter = new GeminiAdapter({ apiKeys: ["test-key-1", "test-key-2"], logger: silentLogger });

    const response = await adapter.complete(request());

    expect(response.content).toBe("second key worked");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("surfaces the last classified error when every key fails", async () => {
    const fetchMock = stubFetch(() => jsonResponse(401, "bad key"));
    const adapter = new GeminiAdapter({ apiKeys: ["test-key-1", "test-key-2"], logger: silentLogger });

    const error = await adapter.complete(request()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind: "auth", status: 401, message: "gemini: auth error: bad key" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("rejects models outside the allow-list without a request", async () => {
    const fetchMock = stubFetch(() => jsonResponse(200, geminiText("unused")));
    const adapter = new GeminiAdapter({ apiKeys: ["test-key-1"], logger: silentLogger });

    await expect(adapter.complete(request({ model: "gpt-5" }))).rejects.toThrow("gemini: model not allowed: gpt-5");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports a non-JSON body as an invalid response", async () => {
    stubFetch(() => new Response("<html>oops</html>", { status: 200 }));
    const adapter = new GeminiAdapter({ apiKeys: ["test-key-1"], logger: silentLogger });

    await expect(adapter.complete(request())).rejects.toMatchObject({
      kind: "invalid_response",
      message: "gemini: invalid json response",
    });
  });

  it("reports transport failures as network errors", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    const adapter = new GeminiAdapter({ apiKeys: ["test-key-1"], logger: silentLogger });

    await expect(adapter.complete(request())).rejects.toMatchObject({
      kind: "network",
      message: "gemini: network error: fetch failed",
    });
  });

  it("fails with no_keys when constructed without credentials", async () => {
    const adapter = new GeminiAdapter({ apiKeys: [], logger: silentLogger });

    await expect(adapter.complete(request())).rejects.toThrow("gemini: no gemini API keys configured");
  });
});
