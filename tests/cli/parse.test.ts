import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import type Database from "better-sqlite3";
import { createTestDb, fixedClock, testConfig } from "../helpers/test-db.js";
import { createProgram } from "../../src/cli.js";
import type { Config } from "../../src/config/config.js";
import { DEFAULT_CONFIG_TOML } from "../../src/config/config.js";

describe("CLI parse", () => {
  let db: Database.Database;
  let output: string;
  let savedNoColor: string | undefined;

  function capture(): (text: string) => void {
    output = "";
    return (text: string) => {
      output += text + "\n";
    };
  }

  // Each call builds a fresh program against the same database, the way
  // separate invocations of the binary would.
  async function run(args: string[], overrides: Partial<Config> = {}): Promise<string> {
    const program = createProgram(db, capture(), testConfig(overrides), fixedClock());
    await program.parseAsync(["node", "tasktrack", ...args]);
    return output;
  }

  async function runJson(args: string[], overrides: Partial<Config> = {}) {
    return JSON.parse(await run([...args, "--json"], overrides));
  }

  beforeEach(() => {
    db = createTestDb();
    output = "";
    savedNoColor = process.env.NO_COLOR;
    process.env.NO_COLOR = "1";
  });

  afterEach(() => {
    db.close();
    process.exitCode = undefined;
    if (savedNoColor !== undefined) {
      process.env.NO_COLOR = savedNoColor;
    } else {
      delete process.env.NO_COLOR;
    }
  });

  describe("project", () => {
    it("add prints the new project", async () => {
      const out = await run(["project", "add", "Home", "-d", "Chores"]);
      const lines = out.split("\n");
      expect(lines[0]).toBe("#1  Home");
      expect(lines[1]).toBe("  Chores");
    });

    it("add --json outputs valid JSON", async () => {
      const parsed = await runJson(["project", "add", "Home"]);
      expect(parsed).toMatchObject({ id: 1, name: "Home", description: "" });
    });

    it("add reports a duplicate name", async () => {
      await run(["project", "add", "Home"]);
      const out = await run(["project", "add", "home"]);
      expect(out).toBe("A project named 'home' already exists.\n");
      expect(process.exitCode).toBe(1);
    });

    it("errors are JSON under --json", async () => {
      await run(["project", "add", "Home"]);
      const parsed = await runJson(["project", "add", "HOME"]);
      expect(parsed).toEqual({
        error: "duplicate_name",
        message: "A project named 'HOME' already exists.",
      });
    });

    it("add enforces max_projects", async () => {
      await run(["project", "add", "One"], { max_projects: 1 });
      const out = await run(["project", "add", "Two"], { max_projects: 1 });
      expect(out).toBe("Cannot create more than 1 project.\n");
    });

    it("list shows a table", async () => {
      await run(["project", "add", "Home", "-d", "Chores"]);
      await run(["project", "add", "Work"]);
      const out = await run(["project", "list"]);
      expect(out.split("\n")).toEqual([
        "ID  NAME  DESCRIPTION",
        "1   Home  Chores",
        "2   Work  ",
        "",
      ]);
    });

    it("list on an empty database prints a hint", async () => {
      const out = await run(["project", "list"]);
      expect(out).toBe('No projects found.\nCreate one with: tasktrack project add "Project name"\n');
    });

    it("show includes the project's tasks", async () => {
      await run(["project", "add", "Home"]);
      await run(["task", "add", "1", "Fix sink", "-d", "Replace the washer"]);
      const parsed = await runJson(["project", "show", "1"]);
      expect(parsed.tasks).toHaveLength(1);
      expect(parsed.tasks[0]).toMatchObject({ title: "Fix sink", overdue: false });
    });

    it("show reports an unknown id", async () => {
      const out = await run(["project", "show", "9"]);
      expect(out).toBe("Project 9 not found.\n");
      expect(process.exitCode).toBe(1);
    });

    it("show reports a malformed id", async () => {
      const parsed = await runJson(["project", "show", "abc"]);
      expect(parsed).toEqual({
        error: "invalid_id",
        message: "Project ID must be a positive integer, got 'abc'.",
      });
    });

    it("update renames and clears the description", async () => {
      await run(["project", "add", "Home", "-d", "Chores"]);
      const parsed = await runJson(["project", "update", "1", "--name", "House", "-d", ""]);
      expect(parsed).toMatchObject({ name: "House", description: "" });
    });

    it("delete removes the project and its tasks", async () => {
      await run(["project", "add", "Home"]);
      await run(["task", "add", "1", "Fix sink", "-d", "Washer"]);
      await run(["task", "add", "1", "Mow lawn", "-d", "Front yard"]);
      const out = await run(["project", "delete", "1"]);
      expect(out).toBe("Deleted project #1 (2 tasks removed).\n");
      expect(await runJson(["task", "list"])).toEqual([]);
    });

    it("delete --json", async () => {
      await run(["project", "add", "Home"]);
      await run(["task", "add", "1", "Fix sink", "-d", "Washer"]);
      expect(await runJson(["project", "delete", "1"])).toEqual({
        id: 1,
        deleted: true,
        tasks_deleted: 1,
      });
    });

    it("search matches name or description", async () => {
      await run(["project", "add", "Home", "-d", "Chores"]);
      await run(["project", "add", "Work", "-d", "Office chores"]);
      await run(["project", "add", "Garden"]);
      const parsed = await runJson(["project", "search", "CHORES"]);
      expect(parsed.map((p: { name: string }) => p.name)).toEqual(["Home", "Work"]);
    });
  });

  describe("task", () => {
    beforeEach(async () => {
      await run(["project", "add", "Home"]);
    });

    it("add prints the new task", async () => {
      const out = await run(["task", "add", "1", "Fix sink", "-d", "Replace the washer"]);
      expect(out.split("\n")).toEqual([
        "#1  Fix sink",
        "  Project: 1  Status: todo",
        "  Replace the washer",
        "",
      ]);
    });

    it("add resolves deadline shorthands", async () => {
      const parsed = await runJson([
        "task", "add", "1", "Fix sink", "-d", "Washer", "--deadline", "tomorrow",
      ]);
      expect(parsed.deadline).toBe("2030-06-11");
    });

    it("add rejects a past deadline", async () => {
      const parsed = await runJson([
        "task", "add", "1", "Fix sink", "-d", "Washer", "--deadline", "2030-06-09",
      ]);
      expect(parsed).toEqual({
        error: "past_deadline",
        message: "Deadline 2030-06-09 is in the past (today is 2030-06-10).",
      });
    });

    it("add rejects an invalid status", async () => {
      const out = await run(["task", "add", "1", "Fix sink", "-d", "Washer", "-s", "blocked"]);
      expect(out).toBe("Invalid status: 'blocked'. Valid statuses are: todo, doing, done.\n");
    });

    it("add requires a description", async () => {
      await expect(run(["task", "add", "1", "Fix sink"])).rejects.toThrow(/description/);
    });

    it("add into an unknown project fails", async () => {
      const out = await run(["task", "add", "7", "Fix sink", "-d", "Washer"]);
      expect(out).toBe("Project 7 not found.\n");
    });

    it("list filters by project and status", async () => {
      await run(["project", "add", "Work"]);
      await run(["task", "add", "1", "Fix sink", "-d", "Washer"]);
      await run(["task", "add", "1", "Mow lawn", "-d", "Front yard", "-s", "doing"]);
      await run(["task", "add", "2", "Write report", "-d", "Quarterly", "-s", "doing"]);

      const doing = await runJson(["task", "list", "-s", "doing"]);
      expect(doing.map((t: { title: string }) => t.title)).toEqual(["Mow lawn", "Write report"]);

      const home = await runJson(["task", "list", "-p", "1", "-s", "doing"]);
      expect(home.map((t: { title: string }) => t.title)).toEqual(["Mow lawn"]);
    });

    it("list checks that the project exists", async () => {
      const out = await run(["task", "list", "-p", "5"]);
      expect(out).toBe("Project 5 not found.\n");
    });

    it("update changes fields and clears the deadline", async () => {
      await run(["task", "add", "1", "Fix sink", "-d", "Washer", "--deadline", "2030-06-20"]);
      const renamed = await runJson(["task", "update", "1", "-t", "Fix kitchen sink"]);
      expect(renamed).toMatchObject({ title: "Fix kitchen sink", deadline: "2030-06-20" });
      const cleared = await runJson(["task", "update", "1", "--deadline", "none"]);
      expect(cleared.deadline).toBeNull();
    });

    it("done closes the task", async () => {
      await run(["task", "add", "1", "Fix sink", "-d", "Washer"]);
      const parsed = await runJson(["task", "done", "1"]);
      expect(parsed).toMatchObject({
        status: "done",
        closed_at: fixedClock()().toISOString(),
      });
    });

    it("delete removes the task", async () => {
      await run(["task", "add", "1", "Fix sink", "-d", "Washer"]);
      expect(await run(["task", "delete", "1"])).toBe("Deleted task #1.\n");
      expect(await run(["task", "show", "1"])).toBe("Task 1 not found.\n");
    });

    it("search stays within the project", async () => {
      await run(["project", "add", "Work"]);
      await run(["task", "add", "1", "Buy paint", "-d", "White"]);
      await run(["task", "add", "2", "Paint office", "-d", "Weekend"]);
      const parsed = await runJson(["task", "search", "1", "paint"]);
      expect(parsed.map((t: { title: string }) => t.title)).toEqual(["Buy paint"]);
    });
  });

  describe("overdue and sweep", () => {
    const lenient = { strict_deadlines: false };

    beforeEach(async () => {
      await run(["project", "add", "Home"], lenient);
      await run(["task", "add", "1", "Late", "-d", "Past due", "--deadline", "2030-06-01"], lenient);
      await run(["task", "add", "1", "Today", "-d", "Due now", "--deadline", "today"], lenient);
    });

    it("overdue lists tasks due before today", async () => {
      const parsed = await runJson(["overdue"], lenient);
      expect(parsed.map((t: { title: string }) => t.title)).toEqual(["Late"]);
      expect(parsed[0].overdue).toBe(true);
    });

    it("sweep closes overdue tasks once", async () => {
      expect(await run(["sweep"], lenient)).toBe("Closed 1 overdue task.\n");
      expect(await run(["sweep"], lenient)).toBe("No overdue tasks to close.\n");
      expect(await runJson(["overdue"], lenient)).toEqual([]);
    });

    it("sweep --json reports the count", async () => {
      expect(await runJson(["sweep"], lenient)).toEqual({ closed_count: 1 });
    });
  });

  describe("long-running commands", () => {
    it("scheduler rejects a bad interval", async () => {
      const out = await run(["scheduler", "--interval", "abc"]);
      expect(out).toBe("Invalid interval: 'abc'. Expected minutes > 0.\n");
      expect(process.exitCode).toBe(1);
    });

    it("server start rejects a bad port", async () => {
      const out = await run(["server", "start", "--port", "70000"]);
      expect(out).toBe("Invalid port: '70000'.\n");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("output format", () => {
    it("follows output_format = json from config", async () => {
      await run(["project", "add", "Home"]);
      const out = await run(["project", "list"], { output_format: "json" });
      expect(JSON.parse(out)).toHaveLength(1);
    });

    it("--plaintext overrides config output_format = json", async () => {
      await run(["project", "add", "Home"]);
      const out = await run(["project", "list", "--plaintext"], { output_format: "json" });
      expect(out.split("\n")[0]).toBe("ID  NAME  DESCRIPTION");
    });
  });

  describe("config", () => {
    let tmpDir: string;
    let savedConfigDir: string | undefined;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tasktrack-cli-"));
      savedConfigDir = process.env.TASKTRACK_CONFIG_DIR;
      process.env.TASKTRACK_CONFIG_DIR = tmpDir;
    });

    afterEach(() => {
      if (savedConfigDir !== undefined) {
        process.env.TASKTRACK_CONFIG_DIR = savedConfigDir;
      } else {
        delete process.env.TASKTRACK_CONFIG_DIR;
      }
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("path prints the config file location", async () => {
      expect(await run(["config", "path"])).toBe(`${path.join(tmpDir, "config.toml")}\n`);
    });

    it("init writes the default config once", async () => {
      const configPath = path.join(tmpDir, "config.toml");
      expect(await run(["config", "init"])).toBe(`Created ${configPath}\n`);
      expect(fs.readFileSync(configPath, "utf-8")).toBe(DEFAULT_CONFIG_TOML);
      expect(await run(["config", "init"])).toBe(`Config file already exists at ${configPath}\n`);
    });
  });
});
