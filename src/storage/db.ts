import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

export type LedgerDatabase = BetterSQLite3Database<typeof schema>;

// Mirrors schema.ts so a fresh file (or :memory:) database is usable without
// running drizzle-kit first.
const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL UNIQUE
);
CREATE TABLE IF NOT EXISTS expenses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  description TEXT NOT NULL,
  amount REAL NOT NULL,
  currency TEXT NOT NULL DEFAULT 'USD',
  payer_id INTEGER NOT NULL REFERENCES users(id)
);
CREATE TABLE IF NOT EXISTS expense_splits (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  expense_id INTEGER NOT NULL REFERENCES expenses(id) ON DELETE CASCADE,
  user_id INTEGER NOT NULL REFERENCES users(id),
  amount REAL NOT NULL,
  percentage REAL
);
CREATE INDEX IF NOT EXISTS expense_splits_expense_id_idx ON expense_splits (expense_id);
CREATE INDEX IF NOT EXISTS expense_splits_user_id_idx ON expense_splits (user_id);
`;

/**
 * Open the ledger database. Each call returns an independent handle, so
 * tests can pass ":memory:" for an isolated store.
 */
export function createDatabase(databasePath: string): { db: LedgerDatabase; close: () => void } {
  const sqlite = new Database(databasePath);
  sqlite.pragma("foreign_keys = ON");
  if (databasePath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(BOOTSTRAP_SQL);

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}
