import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryStores } from "../../src/store/memory.js";
import { ProjectService } from "../../src/projects/service.js";
import { TaskService } from "../../src/tasks/service.js";
import type { Config } from "../../src/config/config.js";
import {
  CapacityExceededError,
  EmptyFieldError,
  InvalidDateFormatError,
  InvalidStatusError,
  NotFoundError,
  PastDeadlineError,
  TooManyWordsError,
} from "../../src/errors.js";
import { FIXED_NOW, testConfig } from "../helpers/test-db.js";

describe("TaskService", () => {
  let projects: ProjectService;
  let service: TaskService;
  let clock: Date;
  let projectId: number;

  function setup(config: Config = testConfig({ max_tasks_per_project: 3 })) {
    const stores = createMemoryStores();
    clock = FIXED_NOW;
    const now = () => new Date(clock.getTime());
    projects = new ProjectService(stores.projects, stores.tasks, config, now);
    service = new TaskService(stores.projects, stores.tasks, config, now);
  }

  beforeEach(async () => {
    setup();
    projectId = (await projects.createProject({ name: "Alpha" })).id;
  });

  describe("createTask", () => {
    it("creates a todo task by default", async () => {
      const task = await service.createTask(projectId, {
        title: " Paint walls\n",
        description: " Two coats ",
      });
      expect(task).toEqual({
        id: 1,
        project_id: projectId,
        title: "Paint walls",
        description: "Two coats",
        status: "todo",
        deadline: null,
        created_at: FIXED_NOW.toISOString(),
        updated_at: FIXED_NOW.toISOString(),
        closed_at: null,
      });
    });

    it("keeps the deadline exactly", async () => {
      const task = await service.createTask(projectId, {
        title: "Ship",
        description: "Release build",
        deadline: "2030-06-30",
      });
      expect((await service.getTask(task.id)).deadline).toBe("2030-06-30");
    });

    it("sets closed_at when created as done", async () => {
      const task = await service.createTask(projectId, {
        title: "Old chore",
        description: "Already finished",
        status: "done",
      });
      expect(task.closed_at).toBe(FIXED_NOW.toISOString());
    });

    it("fails for an unknown project before anything else", async () => {
      await expect(service.createTask(99, { title: "", description: "" })).rejects.toThrow(
        new NotFoundError("project", 99),
      );
    });

    it("enforces the per-project task limit", async () => {
      for (const title of ["One", "Two", "Three"]) {
        await service.createTask(projectId, { title, description: "x" });
      }
      await expect(
        service.createTask(projectId, { title: "Four", description: "x" }),
      ).rejects.toThrow("Cannot create more than 3 tasks per project.");

      const other = await projects.createProject({ name: "Beta" });
      await expect(
        service.createTask(other.id, { title: "Four", description: "x" }),
      ).resolves.toMatchObject({ title: "Four" });
    });

    it("validates title, description, status and deadline", async () => {
      const base = { title: "Valid", description: "Valid text" };
      await expect(service.createTask(projectId, { ...base, title: "" })).rejects.toThrow(
        EmptyFieldError,
      );
      await expect(
        service.createTask(projectId, { ...base, description: Array(151).fill("w").join(" ") }),
      ).rejects.toThrow(TooManyWordsError);
      await expect(service.createTask(projectId, { ...base, status: "blocked" })).rejects.toThrow(
        InvalidStatusError,
      );
      await expect(service.createTask(projectId, { ...base, deadline: "tomorrow" })).rejects.toThrow(
        InvalidDateFormatError,
      );
      await expect(
        service.createTask(projectId, { ...base, deadline: "2030-06-09" }),
      ).rejects.toThrow("Deadline 2030-06-09 is in the past (today is 2030-06-10).");
    });

    it("accepts a deadline of today", async () => {
      const task = await service.createTask(projectId, {
        title: "Today",
        description: "Due now",
        deadline: "2030-06-10",
      });
      expect(task.deadline).toBe("2030-06-10");
    });

    it("accepts past deadlines when strict deadlines are off", async () => {
      setup(testConfig({ strict_deadlines: false }));
      const id = (await projects.createProject({ name: "Loose" })).id;
      const task = await service.createTask(id, {
        title: "Backfill",
        description: "Old item",
        deadline: "2025-01-15",
      });
      expect(task.deadline).toBe("2025-01-15");
    });

    it("only accepts statuses from the configured set", async () => {
      setup(testConfig({ statuses: ["todo", "done"] }));
      const id = (await projects.createProject({ name: "Simple" })).id;
      await expect(
        service.createTask(id, { title: "X", description: "Y", status: "doing" }),
      ).rejects.toThrow("Invalid status: 'doing'. Valid statuses are: todo, done.");
    });
  });

  describe("updateTask", () => {
    it("sets closed_at on done and clears it when reopened", async () => {
      const task = await service.createTask(projectId, { title: "Fix", description: "Leak" });

      clock = new Date(FIXED_NOW.getTime() + 60_000);
      const done = await service.updateTask(task.id, { status: "done" });
      expect(done.status).toBe("done");
      expect(done.closed_at).toBe(clock.toISOString());

      const reopened = await service.updateTask(task.id, { status: "todo" });
      expect(reopened.status).toBe("todo");
      expect(reopened.closed_at).toBeNull();
    });

    it("keeps the first closed_at when done is set again", async () => {
      const task = await service.createTask(projectId, { title: "Fix", description: "Leak" });
      const first = await service.markAsDone(task.id);
      clock = new Date(FIXED_NOW.getTime() + 3_600_000);
      const second = await service.updateTask(task.id, { status: "done" });
      expect(second.closed_at).toBe(first.closed_at);
      expect(second.updated_at).toBe(clock.toISOString());
    });

    it("moves between todo and doing without touching closed_at", async () => {
      const task = await service.createTask(projectId, { title: "Fix", description: "Leak" });
      const doing = await service.updateTask(task.id, { status: "doing" });
      expect(doing.closed_at).toBeNull();
    });

    it("replaces only provided fields", async () => {
      const task = await service.createTask(projectId, {
        title: "Fix",
        description: "Leak",
        deadline: "2030-07-01",
      });
      const updated = await service.updateTask(task.id, { title: "Fix sink" });
      expect(updated).toEqual({ ...task, title: "Fix sink" });
    });

    it("clears the deadline with null or a blank string", async () => {
      const a = await service.createTask(projectId, {
        title: "A",
        description: "a",
        deadline: "2030-07-01",
      });
      const b = await service.createTask(projectId, {
        title: "B",
        description: "b",
        deadline: "2030-07-01",
      });
      expect((await service.updateTask(a.id, { deadline: null })).deadline).toBeNull();
      expect((await service.updateTask(b.id, { deadline: " " })).deadline).toBeNull();
    });

    it("rejects a past deadline on update", async () => {
      const task = await service.createTask(projectId, { title: "A", description: "a" });
      await expect(service.updateTask(task.id, { deadline: "2030-01-01" })).rejects.toThrow(
        PastDeadlineError,
      );
    });

    it("fails for an unknown task", async () => {
      await expect(service.updateTask(12, { title: "X" })).rejects.toThrow(
        "Task 12 not found.",
      );
    });
  });

  describe("queries", () => {
    beforeEach(async () => {
      await service.createTask(projectId, {
        title: "Buy paint",
        description: "White matte",
        deadline: "2030-06-12",
      });
      await service.createTask(projectId, {
        title: "Sand floor",
        description: "Rent a sander",
        status: "doing",
      });
      await service.createTask(projectId, { title: "Clean up", description: "Sweep dust" });
    });

    it("lists tasks of a project in creation order", async () => {
      const titles = (await service.getTasksByProject(projectId)).map((t) => t.title);
      expect(titles).toEqual(["Buy paint", "Sand floor", "Clean up"]);
    });

    it("returns an empty list for an unknown project", async () => {
      expect(await service.getTasksByProject(999)).toEqual([]);
    });

    it("filters by status after validating it", async () => {
      const doing = await service.getTasksByStatus(projectId, "doing");
      expect(doing.map((t) => t.title)).toEqual(["Sand floor"]);
      await expect(service.getTasksByStatus(projectId, "overdue")).rejects.toThrow(
        InvalidStatusError,
      );
    });

    it("searches title and description within a project", async () => {
      const hits = await service.searchTasks(projectId, "SAND");
      expect(hits.map((t) => t.title)).toEqual(["Sand floor"]);
      const dust = await service.searchTasks(projectId, "dust");
      expect(dust.map((t) => t.title)).toEqual(["Clean up"]);
    });

    it("lists across projects with optional filters", async () => {
      const other = await projects.createProject({ name: "Beta" });
      await service.createTask(other.id, { title: "Buy nails", description: "Small ones" });
      expect(await service.listTasks()).toHaveLength(4);
      expect((await service.listTasks({ status: "todo" })).map((t) => t.title)).toEqual([
        "Buy paint",
        "Clean up",
        "Buy nails",
      ]);
      expect(
        (await service.listTasks({ projectId: String(other.id), search: "buy" })).map(
          (t) => t.title,
        ),
      ).toEqual(["Buy nails"]);
    });

    it("counts tasks per project", async () => {
      expect(await service.countTasks(projectId)).toBe(3);
    });

    it("reports overdue tasks once their day has passed", async () => {
      expect(await service.getOverdueTasks()).toEqual([]);

      clock = new Date(2030, 5, 12, 23, 59);
      expect(await service.getOverdueTasks(projectId)).toEqual([]);

      clock = new Date(2030, 5, 13, 0, 1);
      const overdue = await service.getOverdueTasks(projectId);
      expect(overdue.map((t) => t.title)).toEqual(["Buy paint"]);
    });
  });

  describe("deleteTask", () => {
    it("removes the task", async () => {
      const task = await service.createTask(projectId, { title: "A", description: "a" });
      await service.deleteTask(task.id);
      await expect(service.getTask(task.id)).rejects.toThrow(NotFoundError);
    });

    it("fails for an unknown task", async () => {
      await expect(service.deleteTask(3)).rejects.toThrow(new NotFoundError("task", 3));
    });
  });

  describe("closeOverdueTasks", () => {
    it("closes overdue tasks and is idempotent", async () => {
      await service.createTask(projectId, { title: "A", description: "a", deadline: "2030-06-10" });
      await service.createTask(projectId, { title: "B", description: "b", deadline: "2030-06-11" });
      await service.createTask(projectId, { title: "C", description: "c", deadline: "2030-06-30" });

      clock = new Date(2030, 5, 12, 8, 0);
      expect(await service.closeOverdueTasks()).toBe(2);
      expect(await service.closeOverdueTasks()).toBe(0);

      const tasks = await service.getTasksByProject(projectId);
      expect(tasks.map((t) => [t.title, t.status, t.closed_at])).toEqual([
        ["A", "done", clock.toISOString()],
        ["B", "done", clock.toISOString()],
        ["C", "todo", null],
      ]);
    });
  });

  it("exposes the limit on the capacity error", async () => {
    setup(testConfig({ max_tasks_per_project: 1 }));
    const id = (await projects.createProject({ name: "Tiny" })).id;
    await service.createTask(id, { title: "Only", description: "one" });
    const err = await service.createTask(id, { title: "Two", description: "two" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CapacityExceededError);
    expect(err).toHaveProperty("limit", 1);
  });
});
