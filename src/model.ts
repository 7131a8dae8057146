export const TASK_STATUSES = ['todo', 'in-progress', 'done'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  /** Assigned as 1 + max(existing ids); never reused. */
  id: number;
  description: string;
  status: TaskStatus;
  created_at: string; // ISO
  updated_at: string; // ISO
}

export interface TaskChanges {
  description?: string;
  status?: TaskStatus;
}

/**
 * Whatever the GitHub events endpoint answered with. A list in practice, but a
 * 200 with any other JSON body is passed through untouched.
 */
export type EventsBody = unknown[] | { [key: string]: unknown } | string | number | boolean | null;
