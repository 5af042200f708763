import { asc, desc, eq } from "drizzle-orm";
import type { LedgerDatabase } from "../db.js";
import { expenses, expenseSplits } from "../schema.js";
import type { Expense, ExpenseSplit, NewExpense, OwedSplit } from "../../types/index.js";

type ExpenseRow = typeof expenses.$inferSelect;

function withSplits(expense: ExpenseRow, splits: ExpenseSplit[]): Expense {
  return {
    id: expense.id,
    description: expense.description,
    amount: expense.amount,
    currency: expense.currency,
    payerId: expense.payerId,
    splits,
  };
}

export class ExpenseRepo {
  private db: LedgerDatabase;

  constructor(db: LedgerDatabase) {
    this.db = db;
  }

  /**
   * Insert an expense and all of its splits in one transaction.
   * A failing split insert rolls back the expense row as well.
   */
  async create(expense: NewExpense): Promise<Expense> {
    return this.db.transaction((tx) => {
      const row = tx
        .insert(expenses)
        .values({
          description: expense.description,
          amount: expense.amount,
          currency: expense.currency,
          payerId: expense.payerId,
        })
        .returning()
        .get();

      const splits = tx
        .insert(expenseSplits)
        .values(
          expense.splits.map((split) => ({
            expenseId: row.id,
            userId: split.userId,
            amount: split.amount,
            percentage: split.percentage,
          }))
        )
        .returning()
        .all();

      return withSplits(row, splits);
    });
  }

  async findById(id: number): Promise<Expense | null> {
    const expense = await this.db.select().from(expenses).where(eq(expenses.id, id)).get();

    if (!expense) return null;

    const splits = await this.db
      .select()
      .from(expenseSplits)
      .where(eq(expenseSplits.expenseId, id))
      .orderBy(asc(expenseSplits.id));

    return withSplits(expense, splits);
  }

  /** All expenses, newest first, each with its splits. */
  async findAll(): Promise<Expense[]> {
    const expenseRecords = await this.db.select().from(expenses).orderBy(desc(expenses.id));
    const splitRecords = await this.findAllSplits();

    const splitsByExpense = new Map<number, ExpenseSplit[]>();
    for (const split of splitRecords) {
      const bucket = splitsByExpense.get(split.expenseId) ?? [];
      bucket.push(split);
      splitsByExpense.set(split.expenseId, bucket);
    }

    return expenseRecords.map((expense) => withSplits(expense, splitsByExpense.get(expense.id) ?? []));
  }

  async findAllSplits(): Promise<ExpenseSplit[]> {
    return this.db.select().from(expenseSplits).orderBy(asc(expenseSplits.id));
  }

  async findByPayerId(payerId: number): Promise<ExpenseRow[]> {
    return this.db
      .select()
      .from(expenses)
      .where(eq(expenses.payerId, payerId))
      .orderBy(asc(expenses.id));
  }

  /** Splits owed by a user, joined with the owning expense's description and currency. */
  async findOwedSplits(userId: number): Promise<OwedSplit[]> {
    return this.db
      .select({
        id: expenseSplits.id,
        userId: expenseSplits.userId,
        amount: expenseSplits.amount,
        percentage: expenseSplits.percentage,
        description: expenses.description,
        currency: expenses.currency,
      })
      .from(expenseSplits)
      .innerJoin(expenses, eq(expenseSplits.expenseId, expenses.id))
      .where(eq(expenseSplits.userId, userId))
      .orderBy(asc(expenseSplits.id));
  }

  /**
   * Delete an expense together with its splits.
   * @returns false if no expense had this id
   */
  async delete(id: number): Promise<boolean> {
    return this.db.transaction((tx) => {
      tx.delete(expenseSplits).where(eq(expenseSplits.expenseId, id)).run();
      const removed = tx.delete(expenses).where(eq(expenses.id, id)).returning({ id: expenses.id }).all();
      return removed.length > 0;
    });
  }
}
