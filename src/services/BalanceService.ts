import { ExpenseRepo, LedgerRepo, UserRepo } from "../storage/index.js";
import { buildUserReport, calculateBalances } from "../engine/index.js";
import { NotFoundError } from "../errors/index.js";
import type { UserBalance, UserReport } from "../types/index.js";

export class BalanceService {
  private expenseRepo: ExpenseRepo;
  private userRepo: UserRepo;
  private ledgerRepo: LedgerRepo;

  constructor(expenseRepo: ExpenseRepo, userRepo: UserRepo, ledgerRepo: LedgerRepo) {
    this.expenseRepo = expenseRepo;
    this.userRepo = userRepo;
    this.ledgerRepo = ledgerRepo;
  }

  /** Recomputed from the whole history on every call. */
  async getBalances(): Promise<Record<number, UserBalance>> {
    const users = await this.userRepo.findAll();
    const expenses = await this.expenseRepo.findAll();

    return calculateBalances(
      users,
      expenses,
      expenses.flatMap((expense) => expense.splits)
    );
  }

  async getUserReport(userId: number): Promise<UserReport> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError("user not found");
    }

    const paid = await this.expenseRepo.findByPayerId(userId);
    const owes = await this.expenseRepo.findOwedSplits(userId);

    return buildUserReport(paid, owes);
  }

  async clearAll(): Promise<void> {
    await this.ledgerRepo.clearAll();
  }
}
