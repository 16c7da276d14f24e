import type { Project, ProjectDetail } from "../projects/types.js";
import type { Task } from "../tasks/types.js";
import { isOverdue } from "../dates/calendar.js";

export type TaskView = Task & { overdue: boolean };

/** Adds the derived `overdue` flag; it is never stored. */
export function toTaskView(task: Task, today: string): TaskView {
  return { ...task, overdue: isOverdue(task.deadline, task.status, today) };
}

export function formatTaskJson(task: Task, today: string): string {
  return JSON.stringify(toTaskView(task, today), null, 2);
}

export function formatTasksJson(tasks: Task[], today: string): string {
  return JSON.stringify(
    tasks.map((t) => toTaskView(t, today)),
    null,
    2,
  );
}

export function formatProjectJson(project: Project | ProjectDetail, today: string): string {
  if ("tasks" in project) {
    return JSON.stringify(
      { ...project, tasks: project.tasks.map((t) => toTaskView(t, today)) },
      null,
      2,
    );
  }
  return JSON.stringify(project, null, 2);
}

export function formatProjectsJson(projects: Project[]): string {
  return JSON.stringify(projects, null, 2);
}
