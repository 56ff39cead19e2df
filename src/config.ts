import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

const DEFAULT_CONFIG_PATH = "toolloop.config.json";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

const AgentSchema = z.object({
  provider: z.string().min(1).default("gemini"),
  model: z.string().min(1).default("gemini-3-flash-preview"),
  reasoningEffort: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().default(10),
  temperature: z.number().min(0).max(2).default(0.3),
  systemPrompt: z.string().optional(),
});

const TasksSchema = z.object({
  enabled: z.boolean().default(true),
  persist: z.boolean().default(false),
  filePath: z.string().min(1).default("tasks.json"),
});

const ToolsSchema = z.object({
  builtins: z.boolean().default(true),
  workspaceDir: z.string().default("."),
});

const WorkersSchema = z.object({
  enabled: z.boolean().default(false),
  provider: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().default(10),
  systemPrompt: z.string().optional(),
});

const EndpointSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

const ProvidersSchema = z.object({
  gemini: EndpointSchema.default({}),
  codex: EndpointSchema.default({}),
  opus: EndpointSchema.extend({ endpoint: z.string().min(1).optional() }).default({}),
});

const GatewaySchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65_535).default(8080),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
});

const ConfigSchema = z.object({
  agent: AgentSchema.default({}),
  tasks: TasksSchema.default({}),
  tools: ToolsSchema.default({}),
  workers: WorkersSchema.default({}),
  providers: ProvidersSchema.default({}),
  gateway: GatewaySchema.default({}),
  logging: LoggingSchema.default({}),
});

export type ToolloopConfigInput = z.input<typeof ConfigSchema>;

export type ToolloopConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configPath: string;
    workspaceDir: string;
    tasksFilePath: string;
    logFilePath?: string;
  };
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Load and validate the config file. A missing file at the default location
 * yields the defaults; a missing explicit file is an error.
 */
export async function loadConfig(explicitPath?: string): Promise<ToolloopConfig> {
  const configPath = resolveConfigPath(explicitPath);
  const isExplicit = Boolean(explicitPath?.trim() || process.env.TOOLLOOP_CONFIG?.trim());

  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(configPath, "utf-8"));
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (!missing || isExplicit) {
      throw new ConfigError(`Cannot read config ${configPath}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  return parseConfig(raw, configPath);
}

export function parseConfig(raw: unknown, configPath = path.resolve(DEFAULT_CONFIG_PATH)): ToolloopConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ConfigError(`Invalid config ${configPath}: ${where}: ${issue?.message ?? "invalid"}`, {
      cause: parsed.error,
    });
  }
  return resolveConfig(parsed.data, configPath);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.TOOLLOOP_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return path.resolve(pathToUse);
}

function resolveConfig(base: z.infer<typeof ConfigSchema>, configPath: string): ToolloopConfig {
  const baseDir = path.dirname(configPath);
  const workspaceDir = resolveUserPath(base.tools.workspaceDir, baseDir);
  const tasksFilePath = resolveUserPath(base.tasks.filePath, baseDir);
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, baseDir)
    : undefined;

  return {
    ...base,
    resolved: {
      configPath,
      workspaceDir,
      tasksFilePath,
      logFilePath,
    },
  };
}

// ============================================================================
// Credentials
// ============================================================================

export type Env = Record<string, string | undefined>;

/**
 * Keys for one provider prefix: `<PREFIX>_API_KEY` split on commas, then
 * `<PREFIX>_API_KEY_2` through `<PREFIX>_API_KEY_10`. Blank values are skipped.
 */
export function loadKeysFromEnv(prefix: string, env: Env = process.env): string[] {
  const base = `${prefix.toUpperCase()}_API_KEY`;
  const keys: string[] = [];

  for (const item of (env[base] ?? "").split(",")) {
    const trimmed = item.trim();
    if (trimmed) keys.push(trimmed);
  }

  for (let i = 2; i <= 10; i++) {
    const key = env[`${base}_${i}`]?.trim();
    if (key) keys.push(key);
  }

  return keys;
}

function resolveUserPath(value: string, baseDir: string): string {
  const trimmed = value.trim();
  if (!trimmed) return baseDir;
  if (trimmed === "~") return os.homedir();
  if (trimmed.startsWith("~/")) return path.join(os.homedir(), trimmed.slice(2));
  if (path.isAbsolute(trimmed)) return path.normalize(trimmed);
  return path.resolve(baseDir, trimmed);
}
