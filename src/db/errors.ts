// better-sqlite3 reports constraint failures through an extended result code
// on the thrown SqliteError, e.g. "SQLITE_CONSTRAINT_UNIQUE".

function sqliteCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

export function isUniqueViolation(err: unknown): boolean {
  return sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE";
}

export function isForeignKeyViolation(err: unknown): boolean {
  return sqliteCode(err) === "SQLITE_CONSTRAINT_FOREIGNKEY";
}
