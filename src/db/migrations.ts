import type Database from "better-sqlite3";
import { StorageError } from "../errors.js";
import { createLogger } from "../log.js";

export interface Migration {
  version: number;
  /** Short label for the debug log. */
  name: string;
  up: (db: Database.Database) => void;
}

const log = createLogger("db");

/** 0 when the meta table has no schema_version row yet. */
export function getSchemaVersion(db: Database.Database): number {
  const value: unknown = db
    .prepare("SELECT value FROM meta WHERE key = 'schema_version'")
    .pluck()
    .get();
  if (value === undefined) {
    return 0;
  }
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new StorageError(`read schema version (found '${String(value)}')`);
  }
  return Number(value);
}

/**
 * Applies every migration newer than the recorded schema version, oldest
 * first, in a single transaction. Returns how many were applied.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): number {
  const versions = new Set(migrations.map((m) => m.version));
  if (versions.size !== migrations.length) {
    throw new Error("duplicate migration version");
  }

  const currentVersion = getSchemaVersion(db);
  const latest = Math.max(0, ...versions);
  if (currentVersion > latest) {
    log.warn("database schema is newer than this build", {
      schema_version: currentVersion,
      known_version: latest,
    });
    return 0;
  }

  const pending = migrations
    .filter((m) => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);
  if (pending.length === 0) {
    return 0;
  }

  log.debug(`migrating database from v${currentVersion} to v${latest}`);
  const setVersion = db.prepare("UPDATE meta SET value = ? WHERE key = 'schema_version'");

  const run = db.transaction(() => {
    for (const migration of pending) {
      log.debug(`applying v${migration.version}: ${migration.name}`);
      migration.up(db);
      setVersion.run(String(migration.version));
    }
    return pending.length;
  });

  return run();
}
