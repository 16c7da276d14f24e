import type { Task } from "../tasks/types.js";

export interface Project {
  id: number;
  name: string;
  description: string;
  created_at: string;
  updated_at: string;
}

export type ProjectDetail = Project & { tasks: Task[] };

export interface CreateProjectInput {
  name: string;
  description?: string | null;
}

export interface UpdateProjectInput {
  name?: string;
  description?: string | null;
}

export interface ProjectFilter {
  search?: string;
}
