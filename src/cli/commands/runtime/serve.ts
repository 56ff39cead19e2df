/**
 * Runtime Serve Command - Run the HTTP gateway until interrupted
 */

import { createAgent } from "../../../agent/create-agent.js";
import type { ToolloopConfig } from "../../../config.js";
import { GatewayServer } from "../../../gateway/server.js";
import { createLogger } from "../../../log.js";
import { RuntimeError } from "../../error-handler.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface ServeOptions {
  host?: string;
  port?: number;
  quiet?: boolean;
}

export async function serve(cfg: ToolloopConfig, options: ServeOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const logger = createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.logging.fileLevel);

  const agent = await createAgent({ config: cfg, logger });
  const gateway = new GatewayServer({
    config: {
      host: options.host ?? cfg.gateway.host,
      port: options.port ?? cfg.gateway.port,
    },
    logger,
    agent,
  });

  const address = await gateway.start().catch((err: unknown) => {
    throw new RuntimeError(
      `Cannot start gateway: ${err instanceof Error ? err.message : String(err)}`,
      "Pick another port with --port.",
    );
  });
  out.success(`Listening on http://${address.address}:${address.port}`);

  await waitForShutdownSignal();

  out.info("Shutting down...");
  await gateway.stop();
  await agent.getTaskStore()?.flush();
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export default serve;
