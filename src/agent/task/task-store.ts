import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { Logger } from "../../log.js";
import { canTransition, isTerminal } from "./state-machine.js";
import type { Task, TaskRecord, TaskStatus, TaskUpdate } from "./types.js";

export const DEFAULT_TASKS_FILE = "tasks.json";

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
    this.taskId = taskId;
  }
}

export class TaskTransitionError extends Error {
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(
      isTerminal(from)
        ? `task ${taskId} is already ${from}`
        : `invalid task transition for ${taskId}: ${from} -> ${to}`,
    );
    this.name = "TaskTransitionError";
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export class TaskFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`Invalid task file ${filePath}: ${message}`, { cause });
    this.name = "TaskFileError";
    this.filePath = filePath;
  }
}

const TaskRecordSchema = z.object({
  id: z.string().min(1),
  instruction: z.string(),
  status: z.enum(["pending", "running", "completed", "failed"]),
  output: z.string().optional(),
  error: z.string().optional(),
  created_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "created_at must be an ISO-8601 timestamp",
  }),
});

const TaskFileSchema = z.array(TaskRecordSchema);

const TASK_ID_RE = /^task_(\d+)$/;

export interface TaskStoreOptions {
  logger: Logger;
  /** Rewrite the whole table to `filePath` on every mutation. */
  persist?: boolean;
  filePath?: string;
}

/**
 * Task Store - in-memory task table with optional whole-file JSON snapshots
 */
export class TaskStore {
  readonly persist: boolean;
  readonly filePath: string;
  private readonly logger: Logger;
  private readonly tasks: Map<string, Task> = new Map();
  private lastStamp = 0n;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: TaskStoreOptions) {
    this.persist = options.persist ?? false;
    this.filePath = path.resolve(options.filePath ?? DEFAULT_TASKS_FILE);
    this.logger = options.logger.child({ component: "task-store" });
  }

  /**
   * Construct a store and, when persisting, load the existing snapshot.
   * A missing file is an empty store; a malformed one rejects.
   */
  static async open(options: TaskStoreOptions): Promise<TaskStore> {
    const store = new TaskStore(options);
    if (store.persist) {
      await store.load();
    }
    return store;
  }

  async create(instruction: string): Promise<Task> {
    const task: Task = {
      id: this.nextId(),
      instruction,
      status: "pending",
      createdAt: new Date().toISOString(),
    };
    this.tasks.set(task.id, task);
    this.logger.debug({ taskId: task.id }, "Task created");

    try {
      await this.saveIfPersist();
    } catch (err) {
      // A task that never reached disk must not linger as pending.
      this.tasks.delete(task.id);
      throw err;
    }
    return { ...task };
  }

  async update(taskId: string, updates: TaskUpdate): Promise<Task> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }

    const next: Task = { ...task };
    if (updates.status) {
      if (task.status !== updates.status && !canTransition(task.status, updates.status)) {
        throw new TaskTransitionError(taskId, task.status, updates.status);
      }
      next.status = updates.status;
    }
    if (updates.output) next.output = updates.output;
    if (updates.error) next.error = updates.error;

    this.tasks.set(taskId, next);
    this.logger.debug({ taskId, status: next.status }, "Task updated");

    await this.saveIfPersist();
    return { ...next };
  }

  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  /**
   * Newest first; truncated to `limit` when it is positive.
   */
  list(limit = 0): Task[] {
    const tasks = Array.from(this.tasks.values(), (task) => ({ ...task }));
    tasks.sort(compareNewestFirst);
    return limit > 0 ? tasks.slice(0, limit) : tasks;
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Resolves once every snapshot queued so far has been written.
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        this.logger.debug({ filePath: this.filePath }, "No task file found, starting fresh");
        return;
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new TaskFileError(this.filePath, "not valid JSON", err);
    }
    const parsed = TaskFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new TaskFileError(this.filePath, parsed.error.issues[0]?.message ?? "unexpected shape", parsed.error);
    }

    for (const record of parsed.data) {
      const task = fromTaskRecord(record);
      this.tasks.set(task.id, task);
      const stamp = idStamp(task.id);
      if (stamp !== undefined && stamp > this.lastStamp) this.lastStamp = stamp;
    }
    this.logger.info({ taskCount: this.tasks.size, filePath: this.filePath }, "Tasks loaded from disk");
  }

  private saveIfPersist(): Promise<void> {
    if (!this.persist) return Promise.resolve();

    // Snapshot now so queued writes land in mutation order.
    const snapshot = JSON.stringify(Array.from(this.tasks.values(), toTaskRecord), null, 2);
    const write = this.writeChain.then(() => this.writeSnapshot(snapshot));
    // The caller of `write` sees a failure; the chain itself keeps going.
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  private async writeSnapshot(snapshot: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, snapshot, "utf-8");
    await fs.rename(tempPath, this.filePath);
  }

  private nextId(): string {
    const now = BigInt(Date.now()) * 1000n;
    let stamp = now > this.lastStamp ? now : this.lastStamp + 1n;
    while (this.tasks.has(`task_${stamp}`)) stamp++;
    this.lastStamp = stamp;
    return `task_${stamp}`;
  }
}

export function toTaskRecord(task: Task): TaskRecord {
  const record: TaskRecord = {
    id: task.id,
    instruction: task.instruction,
    status: task.status,
    created_at: task.createdAt,
  };
  if (task.output) record.output = task.output;
  if (task.error) record.error = task.error;
  return record;
}

function fromTaskRecord(record: TaskRecord): Task {
  const task: Task = {
    id: record.id,
    instruction: record.instruction,
    status: record.status,
    createdAt: record.created_at,
  };
  if (record.output) task.output = record.output;
  if (record.error) task.error = record.error;
  return task;
}

function idStamp(taskId: string): bigint | undefined {
  const match = TASK_ID_RE.exec(taskId);
  return match?.[1] ? BigInt(match[1]) : undefined;
}

function compareNewestFirst(a: Task, b: Task): number {
  const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
  if (byTime !== 0) return byTime;
  const sa = idStamp(a.id);
  const sb = idStamp(b.id);
  if (sa !== undefined && sb !== undefined) return sb > sa ? 1 : sb < sa ? -1 : 0;
  return b.id.localeCompare(a.id);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
