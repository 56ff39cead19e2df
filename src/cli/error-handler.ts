/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";

import { TaskFileError } from "../agent/task/task-store.js";
import { ConfigError } from "../config.js";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  readonly code: string;
  readonly suggestion?: string;

  constructor(message: string, options: { code: string; suggestion?: string; cause?: unknown } = { code: "CLI_ERROR" }) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.code = options.code;
    this.suggestion = options.suggestion;
  }
}

/**
 * Runtime error (agent run failed, server could not start)
 */
export class RuntimeError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "RUNTIME_ERROR", suggestion });
    this.name = "RuntimeError";
  }
}

/**
 * Validation error (invalid input, etc)
 */
export class ValidationError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "VALIDATION_ERROR", suggestion });
    this.name = "ValidationError";
  }
}

const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check toolloop.config.json and the provider API key variables.",
  },
  RUNTIME_ERROR: {
    title: "Runtime Error",
    help: "Re-run with --verbose to see the agent log.",
  },
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'toolloop --help' for usage information.",
  },
};

function errorCode(err: Error): string {
  if (err instanceof CliError) return err.code;
  if (err instanceof ConfigError || err instanceof TaskFileError) return "CONFIG_ERROR";
  return "";
}

/**
 * Format an error for display
 */
export function formatError(err: unknown, verbose = false): string {
  if (!(err instanceof Error)) {
    return chalk.red.bold("Error: ") + String(err);
  }

  const lines: string[] = [];
  const meta = ERROR_MESSAGES[errorCode(err)];
  if (meta) {
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    const suggestion = err instanceof CliError ? err.suggestion : undefined;
    lines.push(suggestion ? chalk.yellow("Suggestion: ") + suggestion : chalk.dim(`Hint: ${meta.help}`));
  } else {
    lines.push(chalk.red.bold("Error: ") + err.message);
  }

  if (verbose && err.stack) {
    lines.push(chalk.dim("\nStack trace:"));
    lines.push(chalk.dim(err.stack));
  }

  return lines.join("\n");
}

/**
 * Run a command body, reporting any failure on stderr and setting a
 * non-zero exit code.
 */
export async function handleError(fn: () => Promise<unknown>, verbose = false): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(formatError(err, verbose));
    process.exitCode = 1;
  }
}

/**
 * commander argument parsers
 */
export function parseNumberArg(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

export function parseIntegerArg(value: string): number {
  const parsed = parseNumberArg(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}
