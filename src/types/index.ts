// Amounts are decimal currency units, stored as submitted and rounded only
// for comparison and output.

export interface User {
  id: number;
  username: string;
  email: string;
}

export interface ExpenseSplit {
  id: number;
  expenseId: number;
  userId: number;
  amount: number;
  percentage: number | null; // null = equal-split share
}

export interface Expense {
  id: number;
  description: string;
  amount: number;
  currency: string;
  payerId: number;
  splits: ExpenseSplit[];
}

export interface NewSplit {
  userId: number;
  amount: number;
  percentage: number | null;
}

export interface NewExpense {
  description: string;
  amount: number;
  currency: string;
  payerId: number;
  splits: NewSplit[];
}

/** A split joined with the expense that owns it. */
export interface OwedSplit {
  id: number;
  userId: number;
  amount: number;
  percentage: number | null;
  description: string;
  currency: string;
}

export interface UserBalance {
  user_id: number;
  username: string;
  total_paid: number;
  total_owes: number;
  net_balance: number; // positive = owed money by the group, negative = owes the group
}

export interface PaidEntry {
  description: string;
  amount: number;
  currency: string;
}

export interface OwedEntry {
  description: string;
  amount: number;
  currency: string;
  percentage: number | null;
}

export interface UserReport {
  paid: PaidEntry[];
  owes: OwedEntry[];
}

export interface SplitView {
  id: number;
  user_id: number;
  amount: number;
  percentage: number | null;
}

export interface ExpenseView {
  id: number;
  description: string;
  amount: number;
  currency: string;
  payer_id: number;
  splits: SplitView[];
}
