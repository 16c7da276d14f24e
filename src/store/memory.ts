import { createSequence, type IdGenerator } from "../id.js";
import { DuplicateNameError, NotFoundError } from "../errors.js";
import { foldCase } from "../validation.js";
import type { Project, ProjectFilter } from "../projects/types.js";
import type { Task, TaskFilter } from "../tasks/types.js";
import type {
  NewProject,
  NewTask,
  ProjectPatch,
  ProjectStore,
  TaskPatch,
  TaskStore,
} from "./types.js";

interface MemoryState {
  projects: Map<number, Project>;
  tasks: Map<number, Task>;
}

function contains(haystack: string, needle: string): boolean {
  return foldCase(haystack).includes(foldCase(needle));
}

function byId<T extends { id: number }>(a: T, b: T): number {
  return a.id - b.id;
}

function matchesTask(task: Task, filter: TaskFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  if (filter.projectId !== undefined && task.project_id !== filter.projectId) {
    return false;
  }
  if (filter.status && task.status !== filter.status) {
    return false;
  }
  const search = filter.search;
  if (search && !contains(task.title, search) && !contains(task.description, search)) {
    return false;
  }
  if (filter.overdueBefore) {
    if (task.deadline === null || task.status === "done" || task.deadline >= filter.overdueBefore) {
      return false;
    }
  }
  return true;
}

export class MemoryProjectStore implements ProjectStore {
  constructor(
    private state: MemoryState,
    private nextId: IdGenerator,
  ) {}

  async insert(project: NewProject): Promise<Project> {
    if (this.nameTaken(project.name)) {
      throw new DuplicateNameError(project.name);
    }
    const created: Project = { id: this.nextId(), ...project };
    this.state.projects.set(created.id, created);
    return { ...created };
  }

  async get(id: number): Promise<Project | null> {
    const project = this.state.projects.get(id);
    return project ? { ...project } : null;
  }

  async findByName(name: string): Promise<Project | null> {
    const key = foldCase(name);
    for (const project of this.state.projects.values()) {
      if (foldCase(project.name) === key) {
        return { ...project };
      }
    }
    return null;
  }

  async list(filter?: ProjectFilter): Promise<Project[]> {
    const search = filter?.search;
    return [...this.state.projects.values()]
      .filter((p) => !search || contains(p.name, search) || contains(p.description, search))
      .sort(byId)
      .map((p) => ({ ...p }));
  }

  async update(id: number, patch: ProjectPatch): Promise<Project | null> {
    const existing = this.state.projects.get(id);
    if (!existing) {
      return null;
    }
    if (patch.name !== undefined && this.nameTaken(patch.name, id)) {
      throw new DuplicateNameError(patch.name);
    }
    const updated: Project = { ...existing, ...definedFields(patch) };
    this.state.projects.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    if (!this.state.projects.delete(id)) {
      return false;
    }
    for (const task of [...this.state.tasks.values()]) {
      if (task.project_id === id) {
        this.state.tasks.delete(task.id);
      }
    }
    return true;
  }

  async count(): Promise<number> {
    return this.state.projects.size;
  }

  private nameTaken(name: string, exceptId?: number): boolean {
    const key = foldCase(name);
    for (const project of this.state.projects.values()) {
      if (project.id !== exceptId && foldCase(project.name) === key) {
        return true;
      }
    }
    return false;
  }
}

export class MemoryTaskStore implements TaskStore {
  constructor(
    private state: MemoryState,
    private nextId: IdGenerator,
  ) {}

  async insert(task: NewTask): Promise<Task> {
    if (!this.state.projects.has(task.project_id)) {
      throw new NotFoundError("project", task.project_id);
    }
    const created: Task = { id: this.nextId(), ...task };
    this.state.tasks.set(created.id, created);
    return { ...created };
  }

  async get(id: number): Promise<Task | null> {
    const task = this.state.tasks.get(id);
    return task ? { ...task } : null;
  }

  async list(filter?: TaskFilter): Promise<Task[]> {
    return [...this.state.tasks.values()]
      .filter((t) => matchesTask(t, filter))
      .sort(byId)
      .map((t) => ({ ...t }));
  }

  async update(id: number, patch: TaskPatch): Promise<Task | null> {
    const existing = this.state.tasks.get(id);
    if (!existing) {
      return null;
    }
    const updated: Task = { ...existing, ...definedFields(patch) };
    this.state.tasks.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.state.tasks.delete(id);
  }

  async count(filter?: TaskFilter): Promise<number> {
    let n = 0;
    for (const task of this.state.tasks.values()) {
      if (matchesTask(task, filter)) {
        n++;
      }
    }
    return n;
  }

  async closeOverdue(today: string, timestamp: string): Promise<number> {
    let closed = 0;
    for (const task of this.state.tasks.values()) {
      if (matchesTask(task, { overdueBefore: today })) {
        this.state.tasks.set(task.id, {
          ...task,
          status: "done",
          closed_at: timestamp,
          updated_at: timestamp,
        });
        closed++;
      }
    }
    return closed;
  }
}

// Spreading a patch must not overwrite fields with undefined
function definedFields<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch)) {
    if (isKeyOf(patch, key) && patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

export interface MemoryStores {
  projects: MemoryProjectStore;
  tasks: MemoryTaskStore;
}

export interface MemoryStoreOptions {
  projectIds?: IdGenerator;
  taskIds?: IdGenerator;
}

/** A project store and a task store sharing one in-memory dataset. */
export function createMemoryStores(options: MemoryStoreOptions = {}): MemoryStores {
  const state: MemoryState = { projects: new Map(), tasks: new Map() };
  return {
    projects: new MemoryProjectStore(state, options.projectIds ?? createSequence()),
    tasks: new MemoryTaskStore(state, options.taskIds ?? createSequence()),
  };
}
