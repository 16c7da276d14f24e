import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import type { z } from "zod";
import type { Services } from "../main.js";
import { formatLocalDate } from "../dates/calendar.js";
import { AppError, StorageError, sanitizeError } from "../errors.js";
import { toTaskView } from "../format/json.js";
import { createLogger, errorFields, type Logger } from "../log.js";
import type { Task } from "../tasks/types.js";
import {
  projectCreateSchema,
  projectUpdateSchema,
  taskCreateSchema,
  taskUpdateSchema,
  validateId,
} from "../validation.js";
import { VERSION } from "../version.js";

type ErrorStatus = 400 | 404 | 409 | 500;

type BodyResult<T> = { ok: true; data: T } | { ok: false; message: string };

function statusFor(err: AppError): ErrorStatus {
  switch (err.code) {
    case "not_found":
      return 404;
    case "duplicate_name":
      return 409;
    case "storage":
      return 500;
    default:
      return 400;
  }
}

async function parseBody<T, I>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, I>,
): Promise<BodyResult<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { ok: false, message: "Request body must be valid JSON." };
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    return { ok: false, message: field ? `${field}: ${issue.message}` : issue.message };
  }
  return { ok: true, data: result.data };
}

export function createApp(services: Services, log: Logger = createLogger("http")): Hono {
  const app = new Hono();
  const { projects, tasks } = services;
  const today = () => formatLocalDate(services.now());
  const views = (list: Task[]) => list.map((t) => toTaskView(t, today()));

  app.use("*", cors());
  app.use("*", requestLogger((message) => log.info(message)));

  app.onError((err, c) => {
    if (err instanceof AppError && !(err instanceof StorageError)) {
      return c.json({ error: err.code, message: err.message }, statusFor(err));
    }
    log.error("request failed", { method: c.req.method, path: c.req.path, ...errorFields(err) });
    return c.json({ error: "internal", message: sanitizeError(err) }, 500);
  });

  app.notFound((c) => c.json({ error: "not_found", message: "Route not found." }, 404));

  app.get("/health", (c) => c.json({ status: "ok", version: VERSION }));

  // --- Projects ---

  app.get("/projects", async (c) => {
    const search = c.req.query("search");
    const list =
      search === undefined ? await projects.getAllProjects() : await projects.searchProjects(search);
    return c.json(list);
  });

  app.post("/projects", async (c) => {
    const body = await parseBody(c, projectCreateSchema);
    if (!body.ok) {
      return c.json({ error: "invalid_body", message: body.message }, 400);
    }
    const project = await projects.createProject(body.data);
    return c.json(project, 201);
  });

  app.get("/projects/:id", async (c) => {
    const project = await projects.getProject(c.req.param("id"));
    return c.json({ ...project, tasks: views(project.tasks) });
  });

  app.on(["PUT", "PATCH"], "/projects/:id", async (c) => {
    const body = await parseBody(c, projectUpdateSchema);
    if (!body.ok) {
      return c.json({ error: "invalid_body", message: body.message }, 400);
    }
    const project = await projects.updateProject(c.req.param("id"), body.data);
    return c.json(project);
  });

  app.delete("/projects/:id", async (c) => {
    const id = validateId(c.req.param("id"), "project");
    const tasksDeleted = await projects.deleteProject(id);
    return c.json({ id, deleted: true, tasks_deleted: tasksDeleted });
  });

  app.get("/projects/:id/tasks", async (c) => {
    const project = await projects.getProject(c.req.param("id"));
    const list = await tasks.listTasks({
      projectId: project.id,
      status: c.req.query("status"),
      search: c.req.query("search"),
    });
    return c.json(views(list));
  });

  app.post("/projects/:id/tasks", async (c) => {
    const body = await parseBody(c, taskCreateSchema);
    if (!body.ok) {
      return c.json({ error: "invalid_body", message: body.message }, 400);
    }
    const task = await tasks.createTask(c.req.param("id"), body.data);
    return c.json(toTaskView(task, today()), 201);
  });

  // --- Tasks ---
  // Fixed paths go before /tasks/:id

  app.get("/tasks", async (c) => {
    const projectId = c.req.query("project_id");
    if (projectId !== undefined) {
      await projects.getProject(projectId);
    }
    const list = await tasks.listTasks({ projectId, status: c.req.query("status") });
    return c.json(views(list));
  });

  app.get("/tasks/overdue", async (c) => {
    const projectId = c.req.query("project_id");
    if (projectId !== undefined) {
      await projects.getProject(projectId);
    }
    return c.json(views(await tasks.getOverdueTasks(projectId)));
  });

  app.post("/tasks/sweep", async (c) => {
    const closed = await tasks.closeOverdueTasks();
    log.info(`closed ${closed} overdue task(s)`, { count: closed });
    return c.json({ closed_count: closed });
  });

  app.get("/tasks/:id", async (c) => {
    const task = await tasks.getTask(c.req.param("id"));
    return c.json(toTaskView(task, today()));
  });

  app.on(["PUT", "PATCH"], "/tasks/:id", async (c) => {
    const body = await parseBody(c, taskUpdateSchema);
    if (!body.ok) {
      return c.json({ error: "invalid_body", message: body.message }, 400);
    }
    const task = await tasks.updateTask(c.req.param("id"), body.data);
    return c.json(toTaskView(task, today()));
  });

  app.patch("/tasks/:id/done", async (c) => {
    const task = await tasks.markAsDone(c.req.param("id"));
    return c.json(toTaskView(task, today()));
  });

  app.delete("/tasks/:id", async (c) => {
    const id = validateId(c.req.param("id"), "task");
    await tasks.deleteTask(id);
    return c.json({ id, deleted: true });
  });

  return app;
}
