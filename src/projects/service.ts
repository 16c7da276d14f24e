import type { Config } from "../config/config.js";
import { systemClock, type Clock } from "../dates/calendar.js";
import { CapacityExceededError, DuplicateNameError, NotFoundError } from "../errors.js";
import type { ProjectPatch, ProjectStore, TaskStore } from "../store/types.js";
import { validateId, validateProjectDescription, validateProjectName } from "../validation.js";
import type { CreateProjectInput, Project, ProjectDetail, UpdateProjectInput } from "./types.js";

export type ProjectSettings = Pick<Config, "max_projects" | "word_limits">;

export class ProjectService {
  constructor(
    private projects: ProjectStore,
    private tasks: TaskStore,
    private settings: ProjectSettings,
    private now: Clock = systemClock,
  ) {}

  async createProject(input: CreateProjectInput): Promise<Project> {
    const count = await this.projects.count();
    if (count >= this.settings.max_projects) {
      throw new CapacityExceededError("project", this.settings.max_projects);
    }

    const name = validateProjectName(input.name, this.settings.word_limits);
    const description = validateProjectDescription(input.description, this.settings.word_limits);

    if (await this.projects.findByName(name)) {
      throw new DuplicateNameError(name);
    }

    const timestamp = this.now().toISOString();
    return this.projects.insert({
      name,
      description,
      created_at: timestamp,
      updated_at: timestamp,
    });
  }

  async getProject(id: number | string): Promise<ProjectDetail> {
    const project = await this.require(id);
    const tasks = await this.tasks.list({ projectId: project.id });
    return { ...project, tasks };
  }

  async getAllProjects(): Promise<Project[]> {
    return this.projects.list();
  }

  async updateProject(id: number | string, input: UpdateProjectInput): Promise<Project> {
    const existing = await this.require(id);
    const patch: ProjectPatch = { updated_at: this.now().toISOString() };

    if (input.name !== undefined) {
      const name = validateProjectName(input.name, this.settings.word_limits);
      const clash = await this.projects.findByName(name);
      if (clash && clash.id !== existing.id) {
        throw new DuplicateNameError(name);
      }
      patch.name = name;
    }
    if (input.description !== undefined) {
      patch.description = validateProjectDescription(input.description, this.settings.word_limits);
    }

    const updated = await this.projects.update(existing.id, patch);
    if (!updated) {
      throw new NotFoundError("project", existing.id);
    }
    return updated;
  }

  /** Deletes the project with its tasks and returns how many tasks went with it. */
  async deleteProject(id: number | string): Promise<number> {
    const project = await this.require(id);
    const taskCount = await this.tasks.count({ projectId: project.id });
    if (!(await this.projects.delete(project.id))) {
      throw new NotFoundError("project", project.id);
    }
    return taskCount;
  }

  async searchProjects(query: string): Promise<Project[]> {
    return this.projects.list({ search: query.trim() });
  }

  async countProjects(): Promise<number> {
    return this.projects.count();
  }

  private async require(id: number | string): Promise<Project> {
    const projectId = validateId(id, "project");
    const project = await this.projects.get(projectId);
    if (!project) {
      throw new NotFoundError("project", projectId);
    }
    return project;
  }
}
