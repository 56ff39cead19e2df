import type { TaskStatus } from "./types.js";

const LEGAL_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ["running", "completed", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return LEGAL_TRANSITIONS[status].length === 0;
}
