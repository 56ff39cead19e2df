/**
 * Tool Registry - Manages tool registration, discovery, and execution
 *
 * Registration is strict: a name is taken once, and a schema must carry the
 * name it is registered under. Execution never throws; every outcome is a
 * ToolResult. A handler ends the whole run by throwing FinalResultSignal.
 */

import type { Logger } from "../log.js";
import type {
  JSONSchema,
  JsonObject,
  ToolContext,
  ToolDefinition,
  ToolHandler,
  ToolResult,
  ToolSchema,
} from "./types.js";

export class ToolRegistrationError extends Error {
  readonly tool: string;

  constructor(tool: string, message: string) {
    super(message);
    this.name = "ToolRegistrationError";
    this.tool = tool;
  }
}

/**
 * Thrown by handlers whose arguments do not have the expected shape
 */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolArgumentError";
  }
}

/**
 * Thrown by a handler to deliver the run's final answer. The registry turns
 * it into a successful result marked `final`.
 */
export class FinalResultSignal extends Error {
  readonly result: string;

  constructor(result: string) {
    super("final result delivered");
    this.name = "FinalResultSignal";
    this.result = result;
  }
}

interface ToolEntry {
  name: string;
  handler: ToolHandler;
  schema: ToolSchema;
}

/**
 * Tool Registry manages all available tools
 */
export class ToolRegistry {
  private readonly tools: Map<string, ToolEntry> = new Map();
  private readonly logger: Logger;

  constructor(params: { logger: Logger }) {
    this.logger = params.logger.child({ component: "tool-registry" });
  }

  /**
   * Register a tool. A blank schema name is filled from `name`.
   */
  register(name: string, handler: ToolHandler | undefined, schema: Partial<ToolSchema>): void {
    if (!name || !handler) {
      throw new ToolRegistrationError(name, "invalid tool: name and handler are required");
    }
    const schemaName = schema.name || name;
    if (schemaName !== name) {
      throw new ToolRegistrationError(name, `schema name mismatch: ${schemaName} != ${name}`);
    }
    if (this.tools.has(name)) {
      throw new ToolRegistrationError(name, `tool already registered: ${name}`);
    }

    this.tools.set(name, {
      name,
      handler,
      schema: {
        name,
        description: schema.description ?? "",
        parameters: schema.parameters ?? { type: "object", properties: {} },
      },
    });
    this.logger.debug({ tool: name }, "Tool registered");
  }

  /**
   * Execute a tool with proper error handling
   */
  async execute(name: string, args: JsonObject, ctx: ToolContext = {}): Promise<ToolResult> {
    const entry = this.tools.get(name);
    if (!entry) {
      return { success: false, output: "", error: "tool not found" };
    }

    const startTime = Date.now();
    try {
      this.logger.debug({ tool: name, args }, "Executing tool");
      const output = await entry.handler(args, ctx);
      this.logger.debug({ tool: name, duration: Date.now() - startTime }, "Tool execution complete");
      return { success: true, output, error: "" };
    } catch (err) {
      if (err instanceof FinalResultSignal) {
        this.logger.debug({ tool: name }, "Tool delivered the final result");
        return { success: true, output: err.result, error: "", final: true };
      }
      const error = err instanceof Error ? err.message : String(err);
      this.logger.warn({ tool: name, error, duration: Date.now() - startTime }, "Tool execution failed");
      return { success: false, output: "", error };
    }
  }

  /**
   * Get tool schemas for the model. Order is not stable across calls.
   */
  getSchemas(): ToolSchema[] {
    return Array.from(this.tools.values(), (entry) => entry.schema);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get count(): number {
    return this.tools.size;
  }
}

/**
 * Identity helper that pins a tool definition's types
 */
export function defineTool<C extends ToolContext>(tool: ToolDefinition<C>): ToolDefinition<C> {
  return tool;
}

/**
 * Helper to create tool parameters schema
 */
export function defineParams(
  properties: Record<string, { type: string; description?: string; enum?: string[] }>,
  required: string[] = [],
): JSONSchema {
  return {
    type: "object",
    properties,
    required,
  };
}
