import type { Project, ProjectDetail } from "../projects/types.js";
import type { Status, Task } from "../tasks/types.js";
import { isOverdue } from "../dates/calendar.js";
import { bold, dim, green, red, yellow } from "./colors.js";

function colorStatus(status: Status): string {
  switch (status) {
    case "done":
      return green(status);
    case "doing":
      return yellow(status);
    default:
      return status;
  }
}

function checkbox(status: Status): string {
  switch (status) {
    case "done":
      return dim("[x]");
    case "doing":
      return bold("[~]");
    default:
      return dim("[ ]");
  }
}

function formatDeadline(task: Task, today: string): string {
  if (!task.deadline) {
    return "";
  }
  return isOverdue(task.deadline, task.status, today)
    ? red(`${task.deadline} (overdue)`)
    : task.deadline;
}

export function formatProjectText(project: Project | ProjectDetail, today: string): string {
  const lines: string[] = [];
  lines.push(`${dim(`#${project.id}`)}  ${bold(project.name)}`);
  if (project.description) {
    lines.push(`  ${project.description}`);
  }
  lines.push(dim(`  Created: ${project.created_at}  Updated: ${project.updated_at}`));
  if ("tasks" in project) {
    lines.push("");
    lines.push(formatTasksText(project.tasks, today));
  }
  return lines.join("\n");
}

export function formatProjectsText(projects: Project[]): string {
  if (projects.length === 0) {
    return `${dim("No projects found.")}\n${dim('Create one with: tasktrack project add "Project name"')}`;
  }

  const idW = Math.max(2, ...projects.map((p) => String(p.id).length));
  const nameW = Math.max(4, ...projects.map((p) => p.name.length));
  const header = dim(`${"ID".padEnd(idW)}  ${"NAME".padEnd(nameW)}  DESCRIPTION`);
  const rows = projects.map(
    (p) => `${dim(String(p.id).padEnd(idW))}  ${bold(p.name.padEnd(nameW))}  ${p.description}`,
  );
  return [header, ...rows].join("\n");
}

export function formatTaskText(task: Task, today: string): string {
  const lines: string[] = [];
  lines.push(`${dim(`#${task.id}`)}  ${bold(task.title)}`);
  let statusLine = `  Project: ${task.project_id}  Status: ${colorStatus(task.status)}`;
  if (task.deadline) {
    statusLine += `  Deadline: ${formatDeadline(task, today)}`;
  }
  lines.push(statusLine);
  lines.push(`  ${task.description}`);
  if (task.closed_at) {
    lines.push(dim(`  Closed: ${task.closed_at}`));
  }
  return lines.join("\n");
}

export function formatTasksText(tasks: Task[], today: string): string {
  if (tasks.length === 0) {
    return dim("No tasks found.");
  }

  const idW = Math.max(2, ...tasks.map((t) => String(t.id).length));
  const titleW = Math.max(5, ...tasks.map((t) => t.title.length));
  const statusW = Math.max(6, ...tasks.map((t) => t.status.length));

  const header = dim(
    `     ${"ID".padEnd(idW)}  ${"TITLE".padEnd(titleW)}  ${"STATUS".padEnd(statusW)}  DEADLINE`,
  );
  const rows = tasks.map((t) => {
    const status = colorStatus(t.status) + " ".repeat(statusW - t.status.length);
    return `${checkbox(t.status)}  ${dim(String(t.id).padEnd(idW))}  ${bold(t.title.padEnd(titleW))}  ${status}  ${formatDeadline(t, today)}`.trimEnd();
  });
  return [header, ...rows].join("\n");
}

export function formatSweepText(closed: number): string {
  return closed === 0
    ? "No overdue tasks to close."
    : `Closed ${closed} overdue ${closed === 1 ? "task" : "tasks"}.`;
}
