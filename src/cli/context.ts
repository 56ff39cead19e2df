import type { ToolloopConfig } from "../config.js";
import { createLogger, type Logger } from "../log.js";

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Logger for one-shot commands: console output only with --verbose, and on
 * stderr so stdout stays machine-readable. The log file, when configured,
 * always receives records.
 */
export function createCommandLogger(cfg: ToolloopConfig, verbose = false): Logger {
  return createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.logging.fileLevel, {
    console: verbose,
    stderr: true,
  });
}
