import type { LedgerDatabase } from "../db.js";
import { expenses, expenseSplits, users } from "../schema.js";

export class LedgerRepo {
  private db: LedgerDatabase;

  constructor(db: LedgerDatabase) {
    this.db = db;
  }

  /** Wipe every split, expense and user in one transaction. */
  async clearAll(): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(expenseSplits).run();
      tx.delete(expenses).run();
      tx.delete(users).run();
    });
  }
}
