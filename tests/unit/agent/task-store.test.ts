import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { canTransition, isTerminal } from "../../../src/agent/task/state-machine.js";
import {
  TaskFileError,
  TaskNotFoundError,
  TaskStore,
  TaskTransitionError,
  toTaskRecord,
} from "../../../src/agent/task/task-store.js";
import { silentLogger } from "../../helpers.js";

const T0 = Date.parse("2026-01-01T00:00:00.000Z");

describe("TaskStore (in memory)", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates pending tasks with wall-clock ids", async () => {
    const store = new TaskStore({ logger: silentLogger });

    const task = await store.create("say hi");

    expect(task).toEqual({
      id: "task_1767225600000000",
      instruction: "say hi",
      status: "pending",
      createdAt: "2026-01-01T00:00:00.000Z",
    });
    expect(store.get(task.id)).toEqual(task);
  });

  it("keeps ids strictly increasing when the clock does not move", async () => {
    const store = new TaskStore({ logger: silentLogger });

    const ids = [(await store.create("a")).id, (await store.create("b")).id, (await store.create("c")).id];

    expect(ids).toEqual(["task_1767225600000000", "task_1767225600000001", "task_1767225600000002"]);
  });

  it("keeps ids increasing when the clock goes backwards", async () => {
    const store = new TaskStore({ logger: silentLogger });
    vi.setSystemTime(T0 + 5_000);
    const later = await store.create("later");
    vi.setSystemTime(T0);
    const earlier = await store.create("earlier");

    expect(later.id).toBe("task_1767225605000000");
    expect(earlier.id).toBe("task_1767225605000001");
  });

  it("applies updates and ignores empty fields", async () => {
    const store = new TaskStore({ logger: silentLogger });
    const task = await store.create("work");

    const done = await store.update(task.id, { status: "completed", output: "result" });
    const unchanged = await store.update(task.id, { status: "", output: "", error: "" });

    expect(done).toMatchObject({ status: "completed", output: "result" });
    expect(unchanged).toEqual(done);
    expect(store.get(task.id)).toEqual(done);
  });

  it("returns copies that do not alias stored state", async () => {
    const store = new TaskStore({ logger: silentLogger });
    const task = await store.create("work");

    task.status = "failed";

    expect(store.get(task.id)?.status).toBe("pending");
  });

  it("fails to update an unknown task", async () => {
    const store = new TaskStore({ logger: silentLogger });

    await expect(store.update("task_1", { status: "failed" })).rejects.toThrow(new TaskNotFoundError("task_1"));
    await expect(store.update("task_1", { status: "failed" })).rejects.toThrow("task not found: task_1");
  });

  it("rejects moving a task out of a terminal state", async () => {
    const store = new TaskStore({ logger: silentLogger });
    const task = await store.create("work");
    await store.update(task.id, { status: "completed", output: "done" });

    const error = await store.update(task.id, { status: "failed", error: "late" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TaskTransitionError);
    expect(error).toMatchObject({ message: `task ${task.id} is already completed`, from: "completed", to: "failed" });
    expect(store.get(task.id)).toMatchObject({ status: "completed", output: "done" });
    expect(store.get(task.id)?.error).toBeUndefined();
  });

  it("rejects moving a running task back to pending", async () => {
    const store = new TaskStore({ logger: silentLogger });
    const task = await store.create("work");
    await store.update(task.id, { status: "running" });

    await expect(store.update(task.id, { status: "pending" })).rejects.toThrow(
      `invalid task transition for ${task.id}: running -> pending`,
    );
    expect(store.get(task.id)?.status).toBe("running");
  });

  it("lists newest first and honours the limit", async () => {
    const store = new TaskStore({ logger: silentLogger });
    const first = await store.create("first");
    vi.setSystemTime(T0 + 1_000);
    const second = await store.create("second");
    vi.setSystemTime(T0 + 2_000);
    const third = await store.create("third");

    expect(store.list(2).map((t) => t.id)).toEqual([third.id, second.id]);
    expect(store.list().map((t) => t.id)).toEqual([third.id, second.id, first.id]);
    expect(store.list(0)).toHaveLength(3);
    expect(store.size).toBe(3);
  });

  it("orders by creation time, then by id", async () => {
    const store = new TaskStore({ logger: silentLogger });
    vi.setSystemTime(T0 + 10_000);
    const newer = await store.create("newer");
    vi.setSystemTime(T0);
    const older = await store.create("older");
    const olderTwin = await store.create("older twin");

    expect(store.list().map((t) => t.id)).toEqual([newer.id, olderTwin.id, older.id]);
  });
});

describe("TaskStore (persisted)", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "toolloop-tasks-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const store = await TaskStore.open({ logger: silentLogger, persist: true, filePath: path.join(dir, "tasks.json") });
    expect(store.size).toBe(0);
  });

  it("writes the whole table in wire layout and reloads it", async () => {
    const filePath = path.join(dir, "nested", "tasks.json");
    const store = await TaskStore.open({ logger: silentLogger, persist: true, filePath });
    const a = await store.create("first");
    await store.update(a.id, { status: "completed", output: "4" });
    const b = await store.create("second");
    await store.update(b.id, { status: "failed", error: "boom" });
    await store.flush();

    const onDisk: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
    expect(onDisk).toEqual([
      { id: a.id, instruction: "first", status: "completed", output: "4", created_at: a.createdAt },
      { id: b.id, instruction: "second", status: "failed", error: "boom", created_at: b.createdAt },
    ]);

    const reloaded = await TaskStore.open({ logger: silentLogger, persist: true, filePath });
    expect(reloaded.get(a.id)).toEqual(store.get(a.id));
    expect(reloaded.get(b.id)).toEqual(store.get(b.id));

    const c = await reloaded.create("third");
    expect(BigInt(c.id.slice("task_".length))).toBeGreaterThan(BigInt(b.id.slice("task_".length)));
  });

  it("drops a created task whose snapshot could not be written", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "not a directory", "utf-8");
    const store = new TaskStore({ logger: silentLogger, persist: true, filePath: path.join(blocker, "tasks.json") });

    await expect(store.create("doomed")).rejects.toThrow();

    expect(store.size).toBe(0);
    expect(store.list()).toEqual([]);
  });

  it("does not write when persistence is off", async () => {
    const filePath = path.join(dir, "tasks.json");
    const store = new TaskStore({ logger: silentLogger, persist: false, filePath });
    await store.create("ephemeral");
    await store.flush();

    await expect(fs.access(filePath)).rejects.toThrow();
  });

  it("rejects a file that is not JSON", async () => {
    const filePath = path.join(dir, "tasks.json");
    await fs.writeFile(filePath, "{not json", "utf-8");

    const error = await TaskStore.open({ logger: silentLogger, persist: true, filePath }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TaskFileError);
    expect(error).toMatchObject({ message: `Invalid task file ${filePath}: not valid JSON` });
  });

  it("rejects records with the wrong shape", async () => {
    const filePath = path.join(dir, "tasks.json");
    await fs.writeFile(filePath, JSON.stringify([{ id: "task_1", instruction: "x", status: "paused" }]), "utf-8");

    await expect(TaskStore.open({ logger: silentLogger, persist: true, filePath })).rejects.toBeInstanceOf(
      TaskFileError,
    );
  });
});

describe("toTaskRecord", () => {
  it("omits empty output and error", () => {
    expect(
      toTaskRecord({ id: "task_1", instruction: "x", status: "pending", output: "", createdAt: "2026-01-01T00:00:00.000Z" }),
    ).toEqual({ id: "task_1", instruction: "x", status: "pending", created_at: "2026-01-01T00:00:00.000Z" });
  });
});

describe("task state machine", () => {
  it.each([
    { from: "pending", to: "running", allowed: true },
    { from: "pending", to: "completed", allowed: true },
    { from: "pending", to: "failed", allowed: true },
    { from: "running", to: "completed", allowed: true },
    { from: "running", to: "pending", allowed: false },
    { from: "completed", to: "failed", allowed: false },
    { from: "failed", to: "completed", allowed: false },
  ] as const)("$from -> $to is $allowed", ({ from, to, allowed }) => {
    expect(canTransition(from, to)).toBe(allowed);
  });

  it("marks completed and failed as terminal", () => {
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("pending")).toBe(false);
    expect(isTerminal("running")).toBe(false);
  });
});
