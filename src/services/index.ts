import { ExpenseRepo, LedgerRepo, UserRepo, type LedgerDatabase } from "../storage/index.js";
import { UserService } from "./UserService.js";
import { ExpenseService } from "./ExpenseService.js";
import { BalanceService } from "./BalanceService.js";

export { UserService, ExpenseService, BalanceService };

export interface Services {
  userService: UserService;
  expenseService: ExpenseService;
  balanceService: BalanceService;
}

export function createServices(db: LedgerDatabase): Services {
  const userRepo = new UserRepo(db);
  const expenseRepo = new ExpenseRepo(db);
  const ledgerRepo = new LedgerRepo(db);

  return {
    userService: new UserService(userRepo),
    expenseService: new ExpenseService(expenseRepo, userRepo),
    balanceService: new BalanceService(expenseRepo, userRepo, ledgerRepo),
  };
}
