// better-sqlite3 raises SqliteError with an extended result code such as
// SQLITE_CONSTRAINT_UNIQUE; drizzle may wrap it in `cause`.
function sqliteErrorCode(error: unknown): string | undefined {
  let current: unknown = error;

  while (current instanceof Error) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }

  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return sqliteErrorCode(error) === "SQLITE_CONSTRAINT_UNIQUE";
}

export function isForeignKeyViolation(error: unknown): boolean {
  return sqliteErrorCode(error) === "SQLITE_CONSTRAINT_FOREIGNKEY";
}
