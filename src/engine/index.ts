import { SplitMismatchError } from "../errors/index.js";
import type {
  Expense,
  ExpenseSplit,
  ExpenseView,
  OwedSplit,
  User,
  UserBalance,
  UserReport,
} from "../types/index.js";

/** Largest accepted gap between an expense amount and its split total, in cents. */
const SPLIT_TOLERANCE_CENTS = 1;

/**
 * Round a decimal amount to 2 places for comparison or display.
 * Never used while accumulating.
 */
export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function toWholeCents(value: number): number {
  return Math.round(value * 100);
}

/**
 * Check that split amounts add up to the expense amount.
 * Both sides are rounded to 2 places first; the comparison itself runs on
 * whole cents so binary drift cannot turn a 0.01 gap into 0.0100000001.
 * @returns The rounded totals that were compared
 * @throws SplitMismatchError if the totals differ by more than 0.01
 */
export function reconcileSplits(
  amount: number,
  splitAmounts: number[]
): { splitTotal: number; expenseTotal: number } {
  const splitTotal = roundToCents(splitAmounts.reduce((sum, value) => sum + value, 0));
  const expenseTotal = roundToCents(amount);

  const gap = Math.abs(toWholeCents(splitTotal) - toWholeCents(expenseTotal));
  if (gap > SPLIT_TOLERANCE_CENTS) {
    throw new SplitMismatchError(splitTotal, expenseTotal);
  }

  return { splitTotal, expenseTotal };
}

/**
 * Calculate every user's paid, owed and net figures from the full history.
 * Sums are kept unrounded until the output record is built.
 * @returns Balances keyed by user id; users with no activity get zeros
 */
export function calculateBalances(
  users: User[],
  expenses: Array<Pick<Expense, "payerId" | "amount">>,
  splits: Array<Pick<ExpenseSplit, "userId" | "amount">>
): Record<number, UserBalance> {
  const paid = new Map<number, number>();
  const owes = new Map<number, number>();

  for (const user of users) {
    paid.set(user.id, 0);
    owes.set(user.id, 0);
  }

  for (const expense of expenses) {
    const current = paid.get(expense.payerId);
    if (current !== undefined) {
      paid.set(expense.payerId, current + expense.amount);
    }
  }

  for (const split of splits) {
    const current = owes.get(split.userId);
    if (current !== undefined) {
      owes.set(split.userId, current + split.amount);
    }
  }

  const result: Record<number, UserBalance> = {};

  for (const user of users) {
    const totalPaid = roundToCents(paid.get(user.id) ?? 0);
    const totalOwes = roundToCents(owes.get(user.id) ?? 0);

    result[user.id] = {
      user_id: user.id,
      username: user.username,
      total_paid: totalPaid,
      total_owes: totalOwes,
      net_balance: roundToCents(totalPaid - totalOwes),
    };
  }

  return result;
}

/**
 * Project one user's paid expenses and owed splits into a statement.
 * Records keep their input order; nothing is aggregated.
 */
export function buildUserReport(
  paidExpenses: Array<Pick<Expense, "description" | "amount" | "currency">>,
  owedSplits: OwedSplit[]
): UserReport {
  return {
    paid: paidExpenses.map((expense) => ({
      description: expense.description,
      amount: roundToCents(expense.amount),
      currency: expense.currency,
    })),
    owes: owedSplits.map((split) => ({
      description: split.description,
      amount: roundToCents(split.amount),
      currency: split.currency,
      percentage: split.percentage,
    })),
  };
}

export function toExpenseView(expense: Expense): ExpenseView {
  return {
    id: expense.id,
    description: expense.description,
    amount: roundToCents(expense.amount),
    currency: expense.currency,
    payer_id: expense.payerId,
    splits: expense.splits.map((split) => ({
      id: split.id,
      user_id: split.userId,
      amount: roundToCents(split.amount),
      percentage: split.percentage,
    })),
  };
}
