import { describe, it, expect } from "vitest";
import { sql } from "drizzle-orm";
import { getTableConfig } from "drizzle-orm/sqlite-core";
import { createDatabase, expenseSplits } from "../../src/storage/index.js";

describe("createDatabase", () => {
  it("should create the split indexes that the schema declares", () => {
    const { db, close } = createDatabase(":memory:");

    const created = db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master
          WHERE type = 'index' AND tbl_name = 'expense_splits' AND name NOT LIKE 'sqlite_autoindex%'
          ORDER BY name`
    );
    const declared = getTableConfig(expenseSplits)
      .indexes.map((index) => index.config.name)
      .sort();
    close();

    expect(declared).toEqual(["expense_splits_expense_id_idx", "expense_splits_user_id_idx"]);
    expect(created.map((row) => row.name)).toEqual(declared);
  });
});
