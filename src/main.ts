import type { Kysely } from "kysely";
import type { DB } from "./db/kysely.js";
import type { Config } from "./config/config.js";
import { systemClock, type Clock } from "./dates/calendar.js";
import { SqliteProjectStore } from "./projects/repository.js";
import { ProjectService } from "./projects/service.js";
import { SqliteTaskStore } from "./tasks/repository.js";
import { TaskService } from "./tasks/service.js";
import type { ProjectStore, TaskStore } from "./store/types.js";

export interface Services {
  projects: ProjectService;
  tasks: TaskService;
  now: Clock;
}

export function createServicesFromStores(
  stores: { projects: ProjectStore; tasks: TaskStore },
  config: Config,
  now: Clock = systemClock,
): Services {
  return {
    projects: new ProjectService(stores.projects, stores.tasks, config, now),
    tasks: new TaskService(stores.projects, stores.tasks, config, now),
    now,
  };
}

export function createServices(db: Kysely<DB>, config: Config, now: Clock = systemClock): Services {
  return createServicesFromStores(
    { projects: new SqliteProjectStore(db), tasks: new SqliteTaskStore(db) },
    config,
    now,
  );
}
