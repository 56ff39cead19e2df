/**
 * Gateway Server - HTTP front end for the agent engine
 *
 * Routes:
 * - GET  /health
 * - POST /execute
 * - GET  /tasks?limit=N
 *
 * Requests run concurrently; per-request overrides are handed to the engine
 * and never touch its shared config.
 */

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";

import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";

import type { AgentEngine } from "../agent/engine.js";
import { toTaskRecord } from "../agent/task/task-store.js";
import type { AgentResult, ExecutionTrace } from "../agent/types.js";
import type { Logger } from "../log.js";
import { VERSION } from "../version.js";
import {
  type ErrorResponse,
  type ExecuteResponse,
  ExecuteRequestSchema,
  type HealthResponse,
  type TasksResponse,
  type WireTrace,
} from "./types.js";

export const DEFAULT_TASKS_LIMIT = 10;

export interface GatewayConfig {
  port: number;
  host?: string;
}

export class GatewayServer {
  private httpServer: Server | null = null;
  private readonly config: GatewayConfig;
  private readonly logger: Logger;
  private readonly agent: AgentEngine;
  private readonly app: express.Application;

  constructor(params: { config: GatewayConfig; logger: Logger; agent: AgentEngine }) {
    this.config = params.config;
    this.logger = params.logger.child({ component: "gateway" });
    this.agent = params.agent;
    this.app = express();
    this.setupRoutes(this.app);
  }

  /**
   * Start listening. Resolves with the bound address (port 0 picks a free one).
   */
  async start(): Promise<AddressInfo> {
    if (this.httpServer) {
      this.logger.warn("Gateway already running");
      return this.address();
    }

    const server = createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host || "127.0.0.1", () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.httpServer = server;

    const address = this.address();
    this.logger.info({ host: address.address, port: address.port }, "Gateway server started");
    return address;
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });

    this.httpServer = null;
    this.logger.info("Gateway server stopped");
  }

  address(): AddressInfo {
    const address = this.httpServer?.address();
    if (!address || typeof address === "string") {
      throw new Error("Gateway is not listening on a TCP port");
    }
    return address;
  }

  private setupRoutes(app: express.Application): void {
    app.get("/health", (_req, res: Response<HealthResponse>) => {
      res.json({ status: "ok", version: VERSION });
    });

    app.get("/tasks", (req, res: Response<TasksResponse | ErrorResponse>) => {
      const store = this.agent.getTaskStore();
      if (!store) {
        res.status(503).json({ error: "task store disabled" });
        return;
      }
      const limit = parseLimit(req.query.limit);
      res.json({ tasks: store.list(limit).map(toTaskRecord) });
    });

    app.post("/execute", express.json({ type: () => true }), asyncRoute(this.handleExecute.bind(this)));

    app.use((_req, res: Response<ErrorResponse>) => {
      res.status(404).json({ error: "not found" });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (isBodyParseError(err)) {
        res.status(400).json({ error: "invalid json" });
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ error: message }, "Gateway request failed");
      res.status(500).json({ error: message });
    });
  }

  private async handleExecute(req: Request, res: Response<ExecuteResponse | ErrorResponse>): Promise<void> {
    const parsed = ExecuteRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join(".") || "body";
      res.status(400).json({ error: `invalid request: ${field}: ${issue?.message ?? "invalid"}` });
      return;
    }

    const body = parsed.data;
    if (!body.instruction) {
      res.status(400).json({ error: "instruction required" });
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await this.agent.execute(body.instruction, {
      overrides: {
        systemPrompt: body.system_prompt,
        provider: body.provider,
        model: body.model,
        temperature: body.temperature,
        debug: body.debug,
      },
      signal: controller.signal,
    });

    res.json(toExecuteResponse(result));
  }
}

export function toExecuteResponse(result: AgentResult): ExecuteResponse {
  const response: ExecuteResponse = { success: result.success, output: result.output };
  if (result.taskId) response.task_id = result.taskId;
  if (result.trace) response.trace = toWireTrace(result.trace);
  if (result.error) response.error = result.error;
  return response;
}

function toWireTrace(trace: ExecutionTrace): WireTrace {
  return {
    provider: trace.provider,
    model: trace.model,
    iterations: trace.iterations,
    tool_calls: trace.toolCalls.map((call) => ({ name: call.name, args: call.args })),
    tool_results: trace.toolResults.map((r) => ({ name: r.name, success: r.success, output: r.output, error: r.error })),
    raw: trace.raw,
  };
}

/**
 * `limit` query value; anything that is not an integer falls back to the
 * default, and zero or less means no limit.
 */
function parseLimit(value: unknown): number {
  if (typeof value !== "string" || !/^-?\d+$/.test(value.trim())) {
    return DEFAULT_TASKS_LIMIT;
  }
  return Number.parseInt(value, 10);
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}
