import fs from "fs";
import path from "path";
import os from "os";
import { parse } from "smol-toml";
import { STATUSES, type Status } from "../tasks/types.js";
import { DEFAULT_WORD_LIMITS, type WordLimits, type WordRange } from "../validation.js";

export type OutputFormat = "text" | "json";

export interface Config {
  max_projects: number;
  max_tasks_per_project: number;
  statuses: Status[];
  strict_deadlines: boolean;
  /** Minutes between overdue sweeps. */
  sweep_interval: number;
  sweep_on_server: boolean;
  output_format: OutputFormat;
  port: number;
  word_limits: WordLimits;
}

export const DEFAULTS: Config = {
  max_projects: 10,
  max_tasks_per_project: 50,
  statuses: [...STATUSES],
  strict_deadlines: true,
  sweep_interval: 15,
  sweep_on_server: false,
  output_format: "text",
  port: 8000,
  word_limits: DEFAULT_WORD_LIMITS,
};

const VALID_OUTPUT_FORMATS = new Set<string>(["text", "json"]);
const WORD_LIMIT_KEYS = [
  "project_name",
  "project_description",
  "task_title",
  "task_description",
] as const;

export function getConfigDir(): string {
  if (process.env.TASKTRACK_CONFIG_DIR) {
    return process.env.TASKTRACK_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".tasktrack");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.toml");
}

export const DEFAULT_CONFIG_TOML = `# tasktrack configuration

# Maximum number of projects (env: TASKTRACK_MAX_PROJECTS)
max_projects = 10

# Maximum number of tasks in a single project (env: TASKTRACK_MAX_TASKS)
max_tasks_per_project = 50

# Allowed task statuses. Must be a subset of "todo", "doing", "done" and
# include both "todo" and "done".
statuses = ["todo", "doing", "done"]

# Reject deadlines that are already in the past
strict_deadlines = true

# Minutes between automatic overdue sweeps ("tasktrack scheduler")
sweep_interval = 15

# Also run the overdue sweep inside "tasktrack server start"
sweep_on_server = false

# Default output format for CLI commands: "text" or "json"
# (overridable per-command with --json / --plaintext)
output_format = "text"

# Port for the HTTP API (env: TASKTRACK_PORT)
port = 8000

# Word count bounds as [min, max]
[word_limits]
project_name = [1, 30]
project_description = [0, 150]
task_title = [1, 30]
task_description = [1, 150]
`;

function warn(message: string): void {
  process.stderr.write(`Warning: ${message}\n`);
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function parseWordRange(value: unknown): WordRange | null {
  if (!Array.isArray(value) || value.length !== 2) {
    return null;
  }
  const [min, max] = value;
  if (typeof min !== "number" || typeof max !== "number") {
    return null;
  }
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < 1 || min > max) {
    return null;
  }
  return { min, max };
}

function parseStatuses(value: unknown): Status[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const statuses: Status[] = [];
  for (const item of value) {
    const status = STATUSES.find((s) => s === item);
    if (!status) {
      return null;
    }
    if (!statuses.includes(status)) {
      statuses.push(status);
    }
  }
  // The default status and the closing status cannot be switched off
  if (!statuses.includes("todo") || !statuses.includes("done")) {
    return null;
  }
  return statuses;
}

export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? getConfigPath();

  if (!fs.existsSync(resolved)) {
    return cloneDefaults();
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    warn(
      `Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    );
    return cloneDefaults();
  }
  const config = cloneDefaults();

  if (parsed.max_projects !== undefined) {
    if (isPositiveInt(parsed.max_projects)) {
      config.max_projects = parsed.max_projects;
    } else {
      warn("max_projects must be a positive integer. Using default.");
    }
  }

  if (parsed.max_tasks_per_project !== undefined) {
    if (isPositiveInt(parsed.max_tasks_per_project)) {
      config.max_tasks_per_project = parsed.max_tasks_per_project;
    } else {
      warn("max_tasks_per_project must be a positive integer. Using default.");
    }
  }

  if (parsed.statuses !== undefined) {
    const statuses = parseStatuses(parsed.statuses);
    if (statuses) {
      config.statuses = statuses;
    } else {
      warn(`statuses must be a subset of ${STATUSES.join(", ")} including todo and done.`);
    }
  }

  if (parsed.strict_deadlines !== undefined) {
    if (typeof parsed.strict_deadlines === "boolean") {
      config.strict_deadlines = parsed.strict_deadlines;
    } else {
      warn("strict_deadlines must be true or false. Using default.");
    }
  }

  if (parsed.sweep_interval !== undefined) {
    if (isPositiveInt(parsed.sweep_interval)) {
      config.sweep_interval = parsed.sweep_interval;
    } else {
      warn("sweep_interval must be a positive number of minutes. Using default.");
    }
  }

  if (parsed.sweep_on_server !== undefined) {
    if (typeof parsed.sweep_on_server === "boolean") {
      config.sweep_on_server = parsed.sweep_on_server;
    } else {
      warn("sweep_on_server must be true or false. Using default.");
    }
  }

  if (parsed.output_format !== undefined) {
    if (typeof parsed.output_format === "string" && VALID_OUTPUT_FORMATS.has(parsed.output_format)) {
      config.output_format = parsed.output_format === "json" ? "json" : "text";
    } else {
      warn(`output_format must be "text" or "json". Using default.`);
    }
  }

  if (parsed.port !== undefined) {
    if (isPositiveInt(parsed.port) && parsed.port <= 65535) {
      config.port = parsed.port;
    } else {
      warn("port must be an integer between 1 and 65535. Using default.");
    }
  }

  const limits = parsed.word_limits;
  if (isTable(limits)) {
    for (const key of WORD_LIMIT_KEYS) {
      if (!(key in limits)) {
        continue;
      }
      const range = parseWordRange(limits[key]);
      if (range) {
        config.word_limits[key] = range;
      } else {
        warn(`word_limits.${key} must be [min, max] with 0 <= min <= max. Using default.`);
      }
    }
  }

  return config;
}

/** Environment variables win over the config file. */
export function applyEnv(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const result: Config = { ...config };
  const maxProjects = Number(env.TASKTRACK_MAX_PROJECTS);
  if (env.TASKTRACK_MAX_PROJECTS && isPositiveInt(maxProjects)) {
    result.max_projects = maxProjects;
  }
  const maxTasks = Number(env.TASKTRACK_MAX_TASKS);
  if (env.TASKTRACK_MAX_TASKS && isPositiveInt(maxTasks)) {
    result.max_tasks_per_project = maxTasks;
  }
  const port = Number(env.TASKTRACK_PORT);
  if (env.TASKTRACK_PORT && isPositiveInt(port) && port <= 65535) {
    result.port = port;
  }
  if (env.TASKTRACK_FORMAT === "json" || env.TASKTRACK_FORMAT === "text") {
    result.output_format = env.TASKTRACK_FORMAT;
  }
  return result;
}

function cloneDefaults(): Config {
  return {
    ...DEFAULTS,
    statuses: [...DEFAULTS.statuses],
    word_limits: {
      project_name: { ...DEFAULTS.word_limits.project_name },
      project_description: { ...DEFAULTS.word_limits.project_description },
      task_title: { ...DEFAULTS.word_limits.task_title },
      task_description: { ...DEFAULTS.word_limits.task_description },
    },
  };
}
