import type BetterSqlite3 from "better-sqlite3";
import { foldCase } from "../validation.js";

// SQLite's NOCASE, lower() and LIKE only fold ASCII letters. Case-insensitive
// queries compare casefold(column) against a foldCase()d parameter instead.
export function registerCaseFold(db: BetterSqlite3.Database): void {
  db.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? foldCase(value) : null,
  );
}
