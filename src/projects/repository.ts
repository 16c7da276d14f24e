import { sql } from "kysely";
import type { Kysely, SqlBool } from "kysely";
import type { DB } from "../db/kysely.js";
import { isUniqueViolation } from "../db/errors.js";
import { DuplicateNameError, StorageError } from "../errors.js";
import type { NewProject, ProjectPatch, ProjectStore } from "../store/types.js";
import { foldCase } from "../validation.js";
import type { Project, ProjectFilter } from "./types.js";

// name_key is storage-only
const PROJECT_COLUMNS = ["id", "name", "description", "created_at", "updated_at"] as const;

export class SqliteProjectStore implements ProjectStore {
  constructor(private db: Kysely<DB>) {}

  async insert(project: NewProject): Promise<Project> {
    try {
      return await this.db
        .insertInto("projects")
        .values({ ...project, name_key: foldCase(project.name) })
        .returning(PROJECT_COLUMNS)
        .executeTakeFirstOrThrow();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateNameError(project.name);
      }
      throw new StorageError("insert project", err);
    }
  }

  async get(id: number): Promise<Project | null> {
    try {
      const row = await this.db
        .selectFrom("projects")
        .select(PROJECT_COLUMNS)
        .where("id", "=", id)
        .executeTakeFirst();
      return row ?? null;
    } catch (err) {
      throw new StorageError("get project", err);
    }
  }

  async findByName(name: string): Promise<Project | null> {
    try {
      const row = await this.db
        .selectFrom("projects")
        .select(PROJECT_COLUMNS)
        .where("name_key", "=", foldCase(name))
        .executeTakeFirst();
      return row ?? null;
    } catch (err) {
      throw new StorageError("find project by name", err);
    }
  }

  async list(filter?: ProjectFilter): Promise<Project[]> {
    let query = this.db.selectFrom("projects").select(PROJECT_COLUMNS);

    if (filter?.search) {
      const needle = foldCase(filter.search);
      query = query.where(
        sql<SqlBool>`(instr(casefold(name), ${needle}) > 0 OR instr(casefold(description), ${needle}) > 0)`,
      );
    }

    try {
      return await query.orderBy("id", "asc").execute();
    } catch (err) {
      throw new StorageError("list projects", err);
    }
  }

  async update(id: number, patch: ProjectPatch): Promise<Project | null> {
    let updated: bigint;
    try {
      const result = await this.db
        .updateTable("projects")
        .set(patch.name === undefined ? patch : { ...patch, name_key: foldCase(patch.name) })
        .where("id", "=", id)
        .executeTakeFirst();
      updated = BigInt(result.numUpdatedRows);
    } catch (err) {
      if (isUniqueViolation(err) && patch.name !== undefined) {
        throw new DuplicateNameError(patch.name);
      }
      throw new StorageError("update project", err);
    }
    return updated > 0n ? this.get(id) : null;
  }

  async delete(id: number): Promise<boolean> {
    try {
      return await this.db.transaction().execute(async (trx) => {
        // ON DELETE CASCADE covers this too, but only while foreign_keys is on
        await trx.deleteFrom("tasks").where("project_id", "=", id).execute();
        const result = await trx.deleteFrom("projects").where("id", "=", id).executeTakeFirst();
        return BigInt(result.numDeletedRows) > 0n;
      });
    } catch (err) {
      throw new StorageError("delete project", err);
    }
  }

  async count(): Promise<number> {
    try {
      const row = await this.db
        .selectFrom("projects")
        .select((eb) => eb.fn.countAll<number>().as("count"))
        .executeTakeFirstOrThrow();
      return Number(row.count);
    } catch (err) {
      throw new StorageError("count projects", err);
    }
  }
}
