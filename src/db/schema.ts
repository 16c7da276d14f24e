import type Database from "better-sqlite3";
import { createLogger } from "../log.js";
import { foldCase } from "../validation.js";
import { runMigrations, type Migration } from "./migrations.js";

const log = createLogger("db");

interface NamedRow {
  id: number;
  name: string;
}

function isNamedRow(row: unknown): row is NamedRow {
  return (
    typeof row === "object" &&
    row !== null &&
    "id" in row &&
    typeof row.id === "number" &&
    "name" in row &&
    typeof row.name === "string"
  );
}

/**
 * Fills projects.name_key. Names that fold to a key already taken (possible
 * under the old ASCII-only index, e.g. "été" and "ÉTÉ") get the project id
 * appended so the unique index can be built; those projects should be renamed.
 */
function backfillNameKeys(db: Database.Database): void {
  const rows = db.prepare("SELECT id, name FROM projects ORDER BY id").all();
  const update = db.prepare("UPDATE projects SET name_key = ? WHERE id = ?");
  const taken = new Set<string>();
  for (const row of rows) {
    if (!isNamedRow(row)) {
      continue;
    }
    let key = foldCase(row.name);
    if (taken.has(key)) {
      log.warn("project name differs from another only by case; please rename it", {
        id: row.id,
        name: row.name,
      });
      key = `${key}#${row.id}`;
    }
    taken.add(key);
    update.run(key, row.id);
  }
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS projects (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'todo' CHECK (status IN ('todo', 'doing', 'done')),
      deadline TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      closed_at TEXT
    );

    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    INSERT OR IGNORE INTO meta (key, value) VALUES ('schema_version', '1');
  `);

  runMigrations(db, appMigrations);
}

export const appMigrations: Migration[] = [
  {
    version: 2,
    name: "unique project names",
    up: (d) => {
      d.exec(
        "CREATE UNIQUE INDEX IF NOT EXISTS idx_projects_name ON projects(name COLLATE NOCASE)",
      );
    },
  },
  {
    version: 3,
    name: "index tasks by project",
    up: (d) => {
      d.exec("CREATE INDEX IF NOT EXISTS idx_tasks_project_id ON tasks(project_id)");
    },
  },
  {
    version: 4,
    name: "index tasks by deadline",
    up: (d) => {
      d.exec("CREATE INDEX IF NOT EXISTS idx_tasks_deadline_status ON tasks(deadline, status)");
    },
  },
  {
    // NOCASE only folds ASCII; uniqueness moves to a key folded in JS
    version: 5,
    name: "unicode case-folded project name key",
    up: (d) => {
      d.exec("ALTER TABLE projects ADD COLUMN name_key TEXT NOT NULL DEFAULT ''");
      backfillNameKeys(d);
      d.exec(`
        DROP INDEX IF EXISTS idx_projects_name;
        CREATE UNIQUE INDEX idx_projects_name_key ON projects(name_key);
      `);
    },
  },
];
