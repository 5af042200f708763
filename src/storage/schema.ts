import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";

export const users = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  username: text("username").notNull().unique(),
  email: text("email").notNull().unique(),
});

export const expenses = sqliteTable("expenses", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  description: text("description").notNull(),
  amount: real("amount").notNull(),
  currency: text("currency").notNull().default("USD"),
  payerId: integer("payer_id").notNull().references(() => users.id),
});

export const expenseSplits = sqliteTable(
  "expense_splits",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    expenseId: integer("expense_id").notNull().references(() => expenses.id, { onDelete: "cascade" }),
    userId: integer("user_id").notNull().references(() => users.id),
    amount: real("amount").notNull(),
    percentage: real("percentage"), // null = equal split
  },
  (table) => ({
    expenseIdIdx: index("expense_splits_expense_id_idx").on(table.expenseId),
    userIdIdx: index("expense_splits_user_id_idx").on(table.userId),
  })
);
