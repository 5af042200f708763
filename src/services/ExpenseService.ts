import { ExpenseRepo, isForeignKeyViolation } from "../storage/index.js";
import { toExpenseView } from "../engine/index.js";
import { InvalidReferenceError, NotFoundError } from "../errors/index.js";
import { validateExpense, type UserLookup } from "../validation/index.js";
import type { Expense, ExpenseView } from "../types/index.js";

export class ExpenseService {
  private expenseRepo: ExpenseRepo;
  private users: UserLookup;

  constructor(expenseRepo: ExpenseRepo, users: UserLookup) {
    this.expenseRepo = expenseRepo;
    this.users = users;
  }

  async createExpense(input: unknown): Promise<Expense> {
    const expense = await validateExpense(input, this.users);

    try {
      return await this.expenseRepo.create(expense);
    } catch (error) {
      // A referenced user disappeared between validation and insert
      if (isForeignKeyViolation(error)) {
        throw new InvalidReferenceError("one or more split users are invalid");
      }
      throw error;
    }
  }

  async listExpenses(): Promise<ExpenseView[]> {
    const expenses = await this.expenseRepo.findAll();
    return expenses.map(toExpenseView);
  }

  async getExpense(expenseId: number): Promise<ExpenseView> {
    const expense = await this.expenseRepo.findById(expenseId);
    if (!expense) {
      throw new NotFoundError("expense not found");
    }
    return toExpenseView(expense);
  }

  async deleteExpense(expenseId: number): Promise<void> {
    const deleted = await this.expenseRepo.delete(expenseId);
    if (!deleted) {
      throw new NotFoundError("expense not found");
    }
  }
}
