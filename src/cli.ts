import { fileURLToPath } from "url";
import fs from "fs";
import path from "path";
import { Command } from "commander";
import type Database from "better-sqlite3";
import { createServices } from "./main.js";
import { createKysely } from "./db/kysely.js";
import { openDb } from "./db/connection.js";
import { initSchema } from "./db/schema.js";
import {
  applyEnv,
  loadConfig,
  getConfigPath,
  DEFAULT_CONFIG_TOML,
  type Config,
} from "./config/config.js";
import { formatLocalDate, systemClock, type Clock } from "./dates/calendar.js";
import { resolveDateShorthand } from "./dates/parse.js";
import { AppError, StorageError, sanitizeError } from "./errors.js";
import {
  formatProjectText,
  formatProjectsText,
  formatSweepText,
  formatTaskText,
  formatTasksText,
} from "./format/text.js";
import {
  formatProjectJson,
  formatProjectsJson,
  formatTaskJson,
  formatTasksJson,
} from "./format/json.js";
import { createLogger, errorFields } from "./log.js";
import { startServer, waitForShutdown } from "./server/index.js";
import { startSweepScheduler } from "./sweep/scheduler.js";
import type { UpdateTaskInput } from "./tasks/types.js";
import { VERSION } from "./version.js";

interface OutputOpts {
  json?: boolean;
  plaintext?: boolean;
}

function parsePositiveInt(value: string): number | null {
  const n = Number(value);
  return /^\d+$/.test(value.trim()) && Number.isSafeInteger(n) && n > 0 ? n : null;
}

export function createProgram(
  db: Database.Database,
  write: (text: string) => void = (t) => process.stdout.write(t + "\n"),
  config?: Config,
  now: Clock = systemClock,
): Command {
  const resolvedConfig = config ?? applyEnv(loadConfig());
  const ky = createKysely(db);
  const services = createServices(ky, resolvedConfig, now);
  const { projects, tasks } = services;
  const log = createLogger("cli");
  const today = () => formatLocalDate(now());

  const program = new Command("tasktrack")
    .description(
      "tasktrack: projects and tasks with deadlines\n\nUse --json on any data command for machine-readable output (or set TASKTRACK_FORMAT=json, or output_format in config). Run 'tasktrack config init' to create a config file.",
    )
    .version(VERSION);

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  function useJson(opts: OutputOpts): boolean {
    if (opts.plaintext) {
      return false;
    }
    return !!(opts.json || resolvedConfig.output_format === "json");
  }

  function fail(opts: OutputOpts, code: string, message: string): void {
    if (useJson(opts)) {
      write(JSON.stringify({ error: code, message }));
    } else {
      write(message);
    }
    process.exitCode = 1;
  }

  // Typed errors are reported as-is; anything else is logged and hidden
  async function run(opts: OutputOpts, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      if (err instanceof AppError && !(err instanceof StorageError)) {
        fail(opts, err.code, err.message);
        return;
      }
      log.error("command failed", errorFields(err));
      fail(opts, "internal", sanitizeError(err));
    }
  }

  function deadlineArg(value: string | undefined): string | null | undefined {
    if (value === undefined) {
      return undefined;
    }
    if (value.trim().toLowerCase() === "none") {
      return null;
    }
    return resolveDateShorthand(value, now());
  }

  function withOutputOptions(cmd: Command): Command {
    return cmd
      .option("--json", "Output as JSON")
      .option("--plaintext", "Output as plain text (overrides config)");
  }

  // project
  const projectCmd = program.command("project").description("Manage projects");

  withOutputOptions(
    projectCmd
      .command("add <name>")
      .description("Create a project")
      .option("-d, --description <text>", "Project description"),
  ).action(async (name: string, opts: OutputOpts & { description?: string }) => {
    await run(opts, async () => {
      const project = await projects.createProject({ name, description: opts.description });
      write(
        useJson(opts) ? formatProjectJson(project, today()) : formatProjectText(project, today()),
      );
    });
  });

  withOutputOptions(projectCmd.command("list").description("List all projects")).action(
    async (opts: OutputOpts) => {
      await run(opts, async () => {
        const list = await projects.getAllProjects();
        write(useJson(opts) ? formatProjectsJson(list) : formatProjectsText(list));
      });
    },
  );

  withOutputOptions(
    projectCmd.command("show <id>").description("Show a project with its tasks"),
  ).action(async (id: string, opts: OutputOpts) => {
    await run(opts, async () => {
      const project = await projects.getProject(id);
      write(
        useJson(opts) ? formatProjectJson(project, today()) : formatProjectText(project, today()),
      );
    });
  });

  withOutputOptions(
    projectCmd
      .command("update <id>")
      .description("Rename a project or change its description")
      .option("-n, --name <name>", "New name")
      .option("-d, --description <text>", "New description (empty string clears it)"),
  ).action(async (id: string, opts: OutputOpts & { name?: string; description?: string }) => {
    await run(opts, async () => {
      const project = await projects.updateProject(id, {
        name: opts.name,
        description: opts.description,
      });
      write(
        useJson(opts) ? formatProjectJson(project, today()) : formatProjectText(project, today()),
      );
    });
  });

  withOutputOptions(
    projectCmd.command("delete <id>").description("Delete a project and all of its tasks"),
  ).action(async (id: string, opts: OutputOpts) => {
    await run(opts, async () => {
      const project = await projects.getProject(id);
      const removed = await projects.deleteProject(project.id);
      if (useJson(opts)) {
        write(JSON.stringify({ id: project.id, deleted: true, tasks_deleted: removed }));
      } else {
        write(
          `Deleted project #${project.id} (${removed} ${removed === 1 ? "task" : "tasks"} removed).`,
        );
      }
    });
  });

  withOutputOptions(
    projectCmd
      .command("search <query>")
      .description("Find projects by name or description (case-insensitive)"),
  ).action(async (query: string, opts: OutputOpts) => {
    await run(opts, async () => {
      const list = await projects.searchProjects(query);
      write(useJson(opts) ? formatProjectsJson(list) : formatProjectsText(list));
    });
  });

  // task
  const taskCmd = program.command("task").description("Manage tasks");

  withOutputOptions(
    taskCmd
      .command("add <project-id> <title>")
      .description("Add a task to a project")
      .requiredOption("-d, --description <text>", "Task description")
      .option("--deadline <date>", "Deadline (YYYY-MM-DD, 'today', 'tomorrow', 'friday', '+3')")
      .option("-s, --status <status>", "Initial status"),
  ).action(
    async (
      projectId: string,
      title: string,
      opts: OutputOpts & { description: string; deadline?: string; status?: string },
    ) => {
      await run(opts, async () => {
        const task = await tasks.createTask(projectId, {
          title,
          description: opts.description,
          deadline: deadlineArg(opts.deadline),
          status: opts.status,
        });
        write(useJson(opts) ? formatTaskJson(task, today()) : formatTaskText(task, today()));
      });
    },
  );

  withOutputOptions(
    taskCmd
      .command("list")
      .description("List tasks")
      .option("-p, --project <id>", "Only tasks of this project")
      .option("-s, --status <status>", "Filter by status")
      .option("--search <query>", "Filter by title or description"),
  ).action(async (opts: OutputOpts & { project?: string; status?: string; search?: string }) => {
    await run(opts, async () => {
      if (opts.project !== undefined) {
        await projects.getProject(opts.project);
      }
      const list = await tasks.listTasks({
        projectId: opts.project,
        status: opts.status,
        search: opts.search,
      });
      write(useJson(opts) ? formatTasksJson(list, today()) : formatTasksText(list, today()));
    });
  });

  withOutputOptions(taskCmd.command("show <id>").description("Show a task")).action(
    async (id: string, opts: OutputOpts) => {
      await run(opts, async () => {
        const task = await tasks.getTask(id);
        write(useJson(opts) ? formatTaskJson(task, today()) : formatTaskText(task, today()));
      });
    },
  );

  withOutputOptions(
    taskCmd
      .command("update <id>")
      .description("Update a task")
      .option("-t, --title <title>", "New title")
      .option("-d, --description <text>", "New description")
      .option("--deadline <date>", "New deadline ('none' to clear)")
      .option("-s, --status <status>", "New status"),
  ).action(
    async (
      id: string,
      opts: OutputOpts & { title?: string; description?: string; deadline?: string; status?: string },
    ) => {
      await run(opts, async () => {
        const input: UpdateTaskInput = {
          title: opts.title,
          description: opts.description,
          deadline: deadlineArg(opts.deadline),
          status: opts.status,
        };
        const task = await tasks.updateTask(id, input);
        write(useJson(opts) ? formatTaskJson(task, today()) : formatTaskText(task, today()));
      });
    },
  );

  withOutputOptions(taskCmd.command("done <id>").description("Mark a task as done")).action(
    async (id: string, opts: OutputOpts) => {
      await run(opts, async () => {
        const task = await tasks.markAsDone(id);
        write(useJson(opts) ? formatTaskJson(task, today()) : formatTaskText(task, today()));
      });
    },
  );

  withOutputOptions(taskCmd.command("delete <id>").description("Delete a task")).action(
    async (id: string, opts: OutputOpts) => {
      await run(opts, async () => {
        const task = await tasks.getTask(id);
        await tasks.deleteTask(task.id);
        if (useJson(opts)) {
          write(JSON.stringify({ id: task.id, deleted: true }));
        } else {
          write(`Deleted task #${task.id}.`);
        }
      });
    },
  );

  withOutputOptions(
    taskCmd
      .command("search <project-id> <query>")
      .description("Find tasks of a project by title or description (case-insensitive)"),
  ).action(async (projectId: string, query: string, opts: OutputOpts) => {
    await run(opts, async () => {
      const project = await projects.getProject(projectId);
      const list = await tasks.searchTasks(project.id, query);
      write(useJson(opts) ? formatTasksJson(list, today()) : formatTasksText(list, today()));
    });
  });

  // overdue
  withOutputOptions(
    program
      .command("overdue")
      .description("List open tasks whose deadline has passed")
      .option("-p, --project <id>", "Only tasks of this project"),
  ).action(async (opts: OutputOpts & { project?: string }) => {
    await run(opts, async () => {
      if (opts.project !== undefined) {
        await projects.getProject(opts.project);
      }
      const list = await tasks.getOverdueTasks(opts.project);
      write(useJson(opts) ? formatTasksJson(list, today()) : formatTasksText(list, today()));
    });
  });

  // sweep
  withOutputOptions(
    program.command("sweep").description("Close every overdue task now"),
  ).action(async (opts: OutputOpts) => {
    await run(opts, async () => {
      const closed = await tasks.closeOverdueTasks();
      write(useJson(opts) ? JSON.stringify({ closed_count: closed }) : formatSweepText(closed));
    });
  });

  // scheduler
  program
    .command("scheduler")
    .description("Run the overdue sweep periodically (foreground, Ctrl+C to stop)")
    .option("-i, --interval <minutes>", "Minutes between sweeps (default: sweep_interval)")
    .action(async (opts: { interval?: string }) => {
      const minutes =
        opts.interval === undefined ? resolvedConfig.sweep_interval : parsePositiveInt(opts.interval);
      if (minutes === null) {
        fail({}, "invalid_interval", `Invalid interval: '${opts.interval}'. Expected minutes > 0.`);
        return;
      }
      const scheduler = startSweepScheduler({
        run: () => tasks.closeOverdueTasks(),
        intervalMs: minutes * 60_000,
        logger: createLogger("sweep"),
      });
      await waitForShutdown();
      scheduler.stop();
    });

  // server
  const serverCmd = program.command("server").description("Run the HTTP API");

  serverCmd
    .command("start")
    .description("Start the server (runs in foreground, Ctrl+C to stop)")
    .option("--port <port>", "Port to listen on (default: port from config)")
    .action(async (opts: { port?: string }) => {
      const port = opts.port === undefined ? resolvedConfig.port : parsePositiveInt(opts.port);
      if (port === null || port > 65535) {
        fail({}, "invalid_port", `Invalid port: '${opts.port}'.`);
        return;
      }
      const server = startServer({ services, port });
      const scheduler = resolvedConfig.sweep_on_server
        ? startSweepScheduler({
            run: () => tasks.closeOverdueTasks(),
            intervalMs: resolvedConfig.sweep_interval * 60_000,
            logger: createLogger("sweep"),
          })
        : null;
      await waitForShutdown();
      scheduler?.stop();
      await server.close();
    });

  // config
  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .action(() => {
      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath());
    });

  return program;
}

// Entry point when run directly
async function main() {
  const db = openDb();
  initSchema(db);
  const config = applyEnv(loadConfig());
  const program = createProgram(db, undefined, config);

  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version, etc.
    if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") {
      process.exitCode = err.exitCode;
      return;
    }
    throw err;
  } finally {
    db.close();
  }
}

const currentFile = fileURLToPath(import.meta.url);
const isEntryPoint = process.argv[1] && currentFile === fs.realpathSync(process.argv[1]);

if (isEntryPoint) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
