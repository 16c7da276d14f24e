import type { Config } from "../config/config.js";
import { formatLocalDate, systemClock, type Clock } from "../dates/calendar.js";
import { CapacityExceededError, NotFoundError } from "../errors.js";
import type { ProjectStore, TaskPatch, TaskStore } from "../store/types.js";
import { sweepOverdueTasks } from "../sweep/overdue.js";
import {
  validateDeadline,
  validateId,
  validateStatus,
  validateTaskDescription,
  validateTaskTitle,
} from "../validation.js";
import { DEFAULT_STATUS, type CreateTaskInput, type Task, type UpdateTaskInput } from "./types.js";

export type TaskSettings = Pick<
  Config,
  "max_tasks_per_project" | "statuses" | "strict_deadlines" | "word_limits"
>;

export interface ListTasksOptions {
  projectId?: number | string;
  status?: string;
  search?: string;
}

export class TaskService {
  constructor(
    private projects: ProjectStore,
    private tasks: TaskStore,
    private settings: TaskSettings,
    private now: Clock = systemClock,
  ) {}

  async createTask(projectId: number | string, input: CreateTaskInput): Promise<Task> {
    const pid = validateId(projectId, "project");
    if (!(await this.projects.get(pid))) {
      throw new NotFoundError("project", pid);
    }

    const count = await this.tasks.count({ projectId: pid });
    if (count >= this.settings.max_tasks_per_project) {
      throw new CapacityExceededError("task", this.settings.max_tasks_per_project);
    }

    const limits = this.settings.word_limits;
    const title = validateTaskTitle(input.title, limits);
    const description = validateTaskDescription(input.description, limits);
    const status = validateStatus(input.status ?? DEFAULT_STATUS, this.settings.statuses);
    const deadline = validateDeadline(input.deadline, this.deadlineOptions());

    const timestamp = this.now().toISOString();
    return this.tasks.insert({
      project_id: pid,
      title,
      description,
      status,
      deadline,
      created_at: timestamp,
      updated_at: timestamp,
      closed_at: status === "done" ? timestamp : null,
    });
  }

  async getTask(id: number | string): Promise<Task> {
    return this.require(id);
  }

  async getTasksByProject(projectId: number | string): Promise<Task[]> {
    return this.tasks.list({ projectId: validateId(projectId, "project") });
  }

  async getTasksByStatus(projectId: number | string, status: string): Promise<Task[]> {
    const pid = validateId(projectId, "project");
    return this.tasks.list({
      projectId: pid,
      status: validateStatus(status, this.settings.statuses),
    });
  }

  async getOverdueTasks(projectId?: number | string): Promise<Task[]> {
    return this.tasks.list({
      projectId: projectId === undefined ? undefined : validateId(projectId, "project"),
      overdueBefore: this.today(),
    });
  }

  async searchTasks(projectId: number | string, query: string): Promise<Task[]> {
    return this.tasks.list({
      projectId: validateId(projectId, "project"),
      search: query.trim(),
    });
  }

  async listTasks(options: ListTasksOptions = {}): Promise<Task[]> {
    return this.tasks.list({
      projectId:
        options.projectId === undefined ? undefined : validateId(options.projectId, "project"),
      status:
        options.status === undefined
          ? undefined
          : validateStatus(options.status, this.settings.statuses),
      search: options.search?.trim(),
    });
  }

  async countTasks(projectId: number | string): Promise<number> {
    return this.tasks.count({ projectId: validateId(projectId, "project") });
  }

  async updateTask(id: number | string, input: UpdateTaskInput): Promise<Task> {
    const existing = await this.require(id);
    const timestamp = this.now().toISOString();
    const patch: TaskPatch = { updated_at: timestamp };
    const limits = this.settings.word_limits;

    if (input.title !== undefined) {
      patch.title = validateTaskTitle(input.title, limits);
    }
    if (input.description !== undefined) {
      patch.description = validateTaskDescription(input.description, limits);
    }
    if (input.deadline !== undefined) {
      patch.deadline = validateDeadline(input.deadline, this.deadlineOptions());
    }
    if (input.status !== undefined) {
      const status = validateStatus(input.status, this.settings.statuses);
      patch.status = status;
      if (status === "done" && existing.closed_at === null) {
        patch.closed_at = timestamp;
      } else if (status !== "done" && existing.closed_at !== null) {
        patch.closed_at = null;
      }
    }

    const updated = await this.tasks.update(existing.id, patch);
    if (!updated) {
      throw new NotFoundError("task", existing.id);
    }
    return updated;
  }

  async markAsDone(id: number | string): Promise<Task> {
    return this.updateTask(id, { status: "done" });
  }

  async deleteTask(id: number | string): Promise<void> {
    const task = await this.require(id);
    if (!(await this.tasks.delete(task.id))) {
      throw new NotFoundError("task", task.id);
    }
  }

  /** Runs the overdue sweep now and returns the number of tasks closed. */
  async closeOverdueTasks(): Promise<number> {
    return sweepOverdueTasks(this.tasks, this.now());
  }

  private today(): string {
    return formatLocalDate(this.now());
  }

  private deadlineOptions(): { strict: boolean; today: string } {
    return { strict: this.settings.strict_deadlines, today: this.today() };
  }

  private async require(id: number | string): Promise<Task> {
    const taskId = validateId(id, "task");
    const task = await this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError("task", taskId);
    }
    return task;
  }
}
