export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface Task {
  id: string;
  instruction: string;
  status: TaskStatus;
  output?: string;
  error?: string;
  /** ISO-8601 */
  createdAt: string;
}

/**
 * Field overrides for TaskStore.update. An empty string or undefined leaves
 * the field unchanged.
 */
export interface TaskUpdate {
  status?: TaskStatus | "";
  output?: string;
  error?: string;
}

/**
 * Persisted / wire layout of a task
 */
export interface TaskRecord {
  id: string;
  instruction: string;
  status: TaskStatus;
  output?: string;
  error?: string;
  created_at: string;
}
