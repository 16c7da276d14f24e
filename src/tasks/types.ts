export const STATUSES = ["todo", "doing", "done"] as const;
export type Status = (typeof STATUSES)[number];

export const DEFAULT_STATUS: Status = "todo";

export interface Task {
  id: number;
  project_id: number;
  title: string;
  description: string;
  status: Status;
  /** Calendar date, YYYY-MM-DD. */
  deadline: string | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

export interface CreateTaskInput {
  title: string;
  description: string;
  deadline?: string | null;
  status?: string;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string;
  /** null or a blank string clears the deadline. */
  deadline?: string | null;
  status?: string;
}

export interface TaskFilter {
  projectId?: number;
  status?: Status;
  search?: string;
  /** Only tasks not done whose deadline is strictly before this date. */
  overdueBefore?: string;
}
