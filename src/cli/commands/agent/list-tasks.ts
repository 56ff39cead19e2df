/**
 * Agent List Tasks Command - Show recorded tasks from the task file
 */

import { TaskStore, toTaskRecord } from "../../../agent/task/task-store.js";
import type { ToolloopConfig } from "../../../config.js";
import type { Logger } from "../../../log.js";
import { createCommandLogger } from "../../context.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface ListTasksOptions {
  limit?: number;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  logger?: Logger;
}

const PREVIEW_LENGTH = 40;

export async function listTasks(cfg: ToolloopConfig, options: ListTasksOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const logger = options.logger ?? createCommandLogger(cfg, options.verbose);

  if (!cfg.tasks.persist) {
    out.warn("Task persistence is disabled (tasks.persist); tasks only live inside a running process.");
  }

  const store = await TaskStore.open({ logger, persist: true, filePath: cfg.resolved.tasksFilePath });
  const tasks = store.list(options.limit ?? 10);

  if (options.json) {
    out.json(tasks.map(toTaskRecord));
    return;
  }

  if (tasks.length === 0) {
    out.info("No tasks found.");
    return;
  }

  out.header("Tasks");
  out.table(
    tasks.map((task) => ({
      id: task.id,
      status: task.status,
      created: task.createdAt,
      instruction: preview(task.instruction),
    })),
    [
      { key: "id", header: "ID" },
      { key: "status", header: "Status", width: 10 },
      { key: "created", header: "Created" },
      { key: "instruction", header: "Instruction" },
    ],
  );
  out.newline();
  out.info(`${tasks.length} of ${store.size} tasks`);
}

function preview(text: string): string {
  const single = text.replace(/\s+/g, " ").trim();
  return single.length > PREVIEW_LENGTH ? `${single.slice(0, PREVIEW_LENGTH)}...` : single;
}

export default listTasks;
