import { Kysely, SqliteDialect, type Generated } from "kysely";
import type BetterSqlite3 from "better-sqlite3";
import type { Status } from "../tasks/types.js";
import { registerCaseFold } from "./casefold.js";

export interface ProjectTable {
  id: Generated<number>;
  name: string;
  /** foldCase(name); unique. */
  name_key: string;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface TaskTable {
  id: Generated<number>;
  project_id: number;
  title: string;
  description: string;
  status: Status;
  deadline: string | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

export interface MetaTable {
  key: string;
  value: string;
}

export interface DB {
  projects: ProjectTable;
  tasks: TaskTable;
  meta: MetaTable;
}

export function createKysely(db: BetterSqlite3.Database): Kysely<DB> {
  registerCaseFold(db);
  return new Kysely<DB>({
    dialect: new SqliteDialect({ database: db }),
  });
}
