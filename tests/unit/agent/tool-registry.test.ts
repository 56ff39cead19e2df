import { describe, it, expect, vi } from "vitest";

import {
  defineParams,
  ToolArgumentError,
  ToolRegistrationError,
  ToolRegistry,
} from "../../../src/agent/tool-registry.js";
import type { JsonObject, ToolContext, ToolHandler } from "../../../src/agent/types.js";
import { silentLogger } from "../../helpers.js";

const echo: ToolHandler = (args) => `echo:${String(args.text)}`;

describe("ToolRegistry", () => {
  it("registers a tool and exposes its schema", () => {
    const registry = new ToolRegistry({ logger: silentLogger });
    const parameters = defineParams({ text: { type: "string", description: "Text to echo" } }, ["text"]);

    registry.register("echo", echo, { description: "Echo", parameters });

    expect(registry.count).toBe(1);
    expect(registry.has("echo")).toBe(true);
    expect(registry.names()).toEqual(["echo"]);
    expect(registry.getSchemas()).toEqual([{ name: "echo", description: "Echo", parameters }]);
  });

  it("fills a blank schema name and default parameters", () => {
    const registry = new ToolRegistry({ logger: silentLogger });

    registry.register("noop", () => "", {});

    expect(registry.getSchemas()).toEqual([
      { name: "noop", description: "", parameters: { type: "object", properties: {} } },
    ]);
  });

  it.each([
    { name: "", handler: echo, schema: {}, message: "invalid tool: name and handler are required" },
    { name: "echo", handler: undefined, schema: {}, message: "invalid tool: name and handler are required" },
    { name: "echo", handler: echo, schema: { name: "other" }, message: "schema name mismatch: other != echo" },
  ])("rejects $message", ({ name, handler, schema, message }) => {
    const registry = new ToolRegistry({ logger: silentLogger });

    expect(() => registry.register(name, handler, schema)).toThrow(new ToolRegistrationError(name, message));
    expect(registry.count).toBe(0);
  });

  it("rejects a duplicate name and keeps the first handler", async () => {
    const registry = new ToolRegistry({ logger: silentLogger });
    registry.register("echo", echo, {});

    expect(() => registry.register("echo", () => "second", {})).toThrow("tool already registered: echo");

    expect(registry.count).toBe(1);
    await expect(registry.execute("echo", { text: "hi" })).resolves.toEqual({
      success: true,
      output: "echo:hi",
      error: "",
    });
  });

  it("reports an unknown tool as a result", async () => {
    const registry = new ToolRegistry({ logger: silentLogger });

    await expect(registry.execute("missing", {})).resolves.toEqual({
      success: false,
      output: "",
      error: "tool not found",
    });
  });

  it("turns handler failures into results", async () => {
    const registry = new ToolRegistry({ logger: silentLogger });
    registry.register("strict", () => {
      throw new ToolArgumentError("strict: invalid path: Required");
    }, {});
    registry.register("async", async () => Promise.reject(new Error("disk full")), {});

    await expect(registry.execute("strict", {})).resolves.toEqual({
      success: false,
      output: "",
      error: "strict: invalid path: Required",
    });
    await expect(registry.execute("async", {})).resolves.toEqual({ success: false, output: "", error: "disk full" });
  });

  it("passes arguments and context to the handler", async () => {
    const registry = new ToolRegistry({ logger: silentLogger });
    const handler = vi.fn((_args: JsonObject, _ctx: ToolContext) => "ok");
    registry.register("spy", handler, {});
    const controller = new AbortController();

    await registry.execute("spy", { n: 1, nested: { ok: true } }, { signal: controller.signal });

    expect(handler).toHaveBeenCalledWith({ n: 1, nested: { ok: true } }, { signal: controller.signal });
  });
});
