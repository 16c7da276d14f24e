import type { Project, ProjectFilter } from "../projects/types.js";
import type { Status, Task, TaskFilter } from "../tasks/types.js";

/**
 * Persistence ports. The services only talk to these, so the same business
 * rules run against SQLite in production and the in-memory store in tests.
 */

export interface NewProject {
  name: string;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface ProjectPatch {
  name?: string;
  description?: string;
  updated_at: string;
}

export interface ProjectStore {
  insert(project: NewProject): Promise<Project>;
  get(id: number): Promise<Project | null>;
  /** Case-insensitive exact match on name. */
  findByName(name: string): Promise<Project | null>;
  list(filter?: ProjectFilter): Promise<Project[]>;
  update(id: number, patch: ProjectPatch): Promise<Project | null>;
  /** Removes the project and all of its tasks atomically. */
  delete(id: number): Promise<boolean>;
  count(): Promise<number>;
}

export interface NewTask {
  project_id: number;
  title: string;
  description: string;
  status: Status;
  deadline: string | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

export interface TaskPatch {
  title?: string;
  description?: string;
  status?: Status;
  deadline?: string | null;
  closed_at?: string | null;
  updated_at: string;
}

export interface TaskStore {
  insert(task: NewTask): Promise<Task>;
  get(id: number): Promise<Task | null>;
  list(filter?: TaskFilter): Promise<Task[]>;
  update(id: number, patch: TaskPatch): Promise<Task | null>;
  delete(id: number): Promise<boolean>;
  count(filter?: TaskFilter): Promise<number>;
  /**
   * Marks every task due before `today` that is not done as done, in one
   * guarded statement. Returns the number of tasks closed.
   */
  closeOverdue(today: string, timestamp: string): Promise<number>;
}
