import Database from "better-sqlite3";
import path from "path";
import fs from "fs";
import { getConfigDir } from "../config/config.js";
import { createLogger, errorFields } from "../log.js";

// The scheduler and one-off CLI commands may hold the same file open
const BUSY_TIMEOUT_MS = 5000;

const log = createLogger("db");

export function getDbPath(): string {
  if (process.env.TASKTRACK_DB_PATH) {
    return process.env.TASKTRACK_DB_PATH;
  }
  return path.join(getConfigDir(), "tasktrack.db");
}

export function openDb(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? getDbPath();
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true, mode: 0o700 });

  const db = new Database(resolvedPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  try {
    fs.chmodSync(resolvedPath, 0o600);
  } catch (err) {
    log.debug("could not restrict database file permissions", {
      path: resolvedPath,
      ...errorFields(err),
    });
  }

  log.debug("opened database", { path: resolvedPath });
  return db;
}
