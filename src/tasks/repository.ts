import { sql } from "kysely";
import type { Kysely, SelectQueryBuilder, SqlBool } from "kysely";
import type { DB } from "../db/kysely.js";
import { isForeignKeyViolation } from "../db/errors.js";
import { NotFoundError, StorageError } from "../errors.js";
import type { NewTask, TaskPatch, TaskStore } from "../store/types.js";
import { foldCase } from "../validation.js";
import type { Task, TaskFilter } from "./types.js";

function applyFilter<O>(
  query: SelectQueryBuilder<DB, "tasks", O>,
  filter: TaskFilter | undefined,
): SelectQueryBuilder<DB, "tasks", O> {
  if (filter?.projectId !== undefined) {
    query = query.where("project_id", "=", filter.projectId);
  }
  if (filter?.status) {
    query = query.where("status", "=", filter.status);
  }
  if (filter?.search) {
    const needle = foldCase(filter.search);
    query = query.where(
      sql<SqlBool>`(instr(casefold(title), ${needle}) > 0 OR instr(casefold(description), ${needle}) > 0)`,
    );
  }
  if (filter?.overdueBefore) {
    query = query
      .where("deadline", "is not", null)
      .where("deadline", "<", filter.overdueBefore)
      .where("status", "!=", "done");
  }
  return query;
}

export class SqliteTaskStore implements TaskStore {
  constructor(private db: Kysely<DB>) {}

  async insert(task: NewTask): Promise<Task> {
    try {
      return await this.db.insertInto("tasks").values(task).returningAll().executeTakeFirstOrThrow();
    } catch (err) {
      if (isForeignKeyViolation(err)) {
        throw new NotFoundError("project", task.project_id);
      }
      throw new StorageError("insert task", err);
    }
  }

  async get(id: number): Promise<Task | null> {
    try {
      const row = await this.db
        .selectFrom("tasks")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row ?? null;
    } catch (err) {
      throw new StorageError("get task", err);
    }
  }

  async list(filter?: TaskFilter): Promise<Task[]> {
    const query = applyFilter(this.db.selectFrom("tasks").selectAll(), filter);
    try {
      return await query.orderBy("id", "asc").execute();
    } catch (err) {
      throw new StorageError("list tasks", err);
    }
  }

  async update(id: number, patch: TaskPatch): Promise<Task | null> {
    let updated: bigint;
    try {
      const result = await this.db
        .updateTable("tasks")
        .set(patch)
        .where("id", "=", id)
        .executeTakeFirst();
      updated = BigInt(result.numUpdatedRows);
    } catch (err) {
      throw new StorageError("update task", err);
    }
    return updated > 0n ? this.get(id) : null;
  }

  async delete(id: number): Promise<boolean> {
    try {
      const result = await this.db.deleteFrom("tasks").where("id", "=", id).executeTakeFirst();
      return BigInt(result.numDeletedRows) > 0n;
    } catch (err) {
      throw new StorageError("delete task", err);
    }
  }

  async count(filter?: TaskFilter): Promise<number> {
    const query = applyFilter(
      this.db.selectFrom("tasks").select((eb) => eb.fn.countAll<number>().as("count")),
      filter,
    );
    try {
      const row = await query.executeTakeFirstOrThrow();
      return Number(row.count);
    } catch (err) {
      throw new StorageError("count tasks", err);
    }
  }

  async closeOverdue(today: string, timestamp: string): Promise<number> {
    try {
      const result = await this.db
        .updateTable("tasks")
        .set({ status: "done", closed_at: timestamp, updated_at: timestamp })
        .where("deadline", "is not", null)
        .where("deadline", "<", today)
        .where("status", "!=", "done")
        .executeTakeFirst();
      return Number(result.numUpdatedRows);
    } catch (err) {
      throw new StorageError("close overdue tasks", err);
    }
  }
}
