import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  createDatabase,
  ExpenseRepo,
  UserRepo,
  isForeignKeyViolation,
  type LedgerDatabase,
} from "../../src/storage/index.js";
import { createServices, ExpenseService, type Services } from "../../src/services/index.js";
import {
  DuplicateUserError,
  InvalidReferenceError,
  NotFoundError,
  SplitMismatchError,
} from "../../src/errors/index.js";
import type { User } from "../../src/types/index.js";

describe("ledger services", () => {
  let db: LedgerDatabase;
  let close: () => void;
  let services: Services;

  beforeEach(() => {
    ({ db, close } = createDatabase(":memory:"));
    services = createServices(db);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    close();
  });

  async function createTrio(): Promise<[User, User, User]> {
    const a = await services.userService.createUser({ username: "alice", email: "alice@example.com" });
    const b = await services.userService.createUser({ username: "bob", email: "bob@example.com" });
    const c = await services.userService.createUser({ username: "carol", email: "carol@example.com" });
    return [a, b, c];
  }

  describe("users", () => {
    it("should create users with sequential ids and list them in order", async () => {
      const [a, b] = await createTrio();

      expect(a).toEqual({ id: 1, username: "alice", email: "alice@example.com" });
      expect(b.id).toBe(2);
      expect((await services.userService.listUsers()).map((u) => u.username)).toEqual([
        "alice",
        "bob",
        "carol",
      ]);
    });

    it("should reject a duplicate username or email", async () => {
      await createTrio();

      await expect(
        services.userService.createUser({ username: "alice", email: "other@example.com" })
      ).rejects.toThrow(DuplicateUserError);
      await expect(
        services.userService.createUser({ username: "alicia", email: "alice@example.com" })
      ).rejects.toThrow("username or email already exists");
    });

    it("should map a unique-constraint failure to DuplicateUserError", async () => {
      await createTrio();
      // Another writer inserted the row after the duplicate lookup ran
      vi.spyOn(UserRepo.prototype, "findByUsernameOrEmail").mockResolvedValue(null);

      await expect(
        services.userService.createUser({ username: "alice", email: "other@example.com" })
      ).rejects.toThrow(new DuplicateUserError());
      expect(await services.userService.listUsers()).toHaveLength(3);
    });

    it("should compare usernames and emails exactly", async () => {
      await createTrio();

      const shouty = await services.userService.createUser({
        username: "ALICE",
        email: "ALICE@example.com",
      });

      expect(shouty.id).toBe(4);
    });
  });

  describe("expenses", () => {
    it("should compute the three-way dinner balances", async () => {
      const [a, b, c] = await createTrio();

      const expense = await services.expenseService.createExpense({
        description: "Dinner",
        amount: 30,
        currency: "USD",
        payer_id: a.id,
        splits: [
          { user_id: a.id, amount: 10 },
          { user_id: b.id, amount: 10 },
          { user_id: c.id, amount: 10 },
        ],
      });

      expect(expense.id).toBe(1);
      expect(await services.balanceService.getBalances()).toEqual({
        1: { user_id: 1, username: "alice", total_paid: 30, total_owes: 10, net_balance: 20 },
        2: { user_id: 2, username: "bob", total_paid: 0, total_owes: 10, net_balance: -10 },
        3: { user_id: 3, username: "carol", total_paid: 0, total_owes: 10, net_balance: -10 },
      });
    });

    it("should reject a 29.50 split total against 30 and persist nothing", async () => {
      const [a, b, c] = await createTrio();

      await expect(
        services.expenseService.createExpense({
          description: "Dinner",
          amount: 30,
          currency: "USD",
          payer_id: a.id,
          splits: [
            { user_id: a.id, amount: 10 },
            { user_id: b.id, amount: 10 },
            { user_id: c.id, amount: 9.5 },
          ],
        })
      ).rejects.toThrow(SplitMismatchError);

      expect(await services.expenseService.listExpenses()).toEqual([]);
    });

    it("should accept a 29.995 split total against 30.00", async () => {
      const [a, b, c] = await createTrio();

      const expense = await services.expenseService.createExpense({
        description: "Dinner",
        amount: "30.00",
        currency: "USD",
        payer_id: a.id,
        splits: [
          { user_id: a.id, amount: 10 },
          { user_id: b.id, amount: 10 },
          { user_id: c.id, amount: 9.995 },
        ],
      });

      expect(expense.splits).toHaveLength(3);
      expect(expense.splits[2].amount).toBe(9.995);
    });

    it("should persist nothing when a split user is unknown mid-list", async () => {
      const [a, b] = await createTrio();

      await expect(
        services.expenseService.createExpense({
          description: "Dinner",
          amount: 30,
          currency: "USD",
          payer_id: a.id,
          splits: [
            { user_id: a.id, amount: 10 },
            { user_id: 404, amount: 10 },
            { user_id: b.id, amount: 10 },
          ],
        })
      ).rejects.toThrow(InvalidReferenceError);

      expect(await services.expenseService.listExpenses()).toEqual([]);
    });

    it("should map a foreign-key failure on insert to InvalidReferenceError", async () => {
      const [a] = await createTrio();
      // Reports every id as present, as if user 404 vanished after the lookup
      const expenseService = new ExpenseService(new ExpenseRepo(db), {
        async findExistingIds(ids: number[]) {
          return new Set(ids);
        },
      });

      await expect(
        expenseService.createExpense({
          description: "Dinner",
          amount: 20,
          currency: "USD",
          payer_id: a.id,
          splits: [
            { user_id: a.id, amount: 10 },
            { user_id: 404, amount: 10 },
          ],
        })
      ).rejects.toThrow(new InvalidReferenceError("one or more split users are invalid"));

      expect(await services.expenseService.listExpenses()).toEqual([]);
    });

    it("should roll back the expense row when a split insert fails", async () => {
      const [a] = await createTrio();
      const repo = new ExpenseRepo(db);

      const error = await repo
        .create({
          description: "Orphan",
          amount: 20,
          currency: "USD",
          payerId: a.id,
          splits: [
            { userId: a.id, amount: 10, percentage: null },
            { userId: 404, amount: 10, percentage: null },
          ],
        })
        .catch((caught: unknown) => caught);

      expect(isForeignKeyViolation(error)).toBe(true);
      expect(await repo.findAll()).toEqual([]);
      expect(await repo.findAllSplits()).toEqual([]);
    });

    it("should list expenses newest first with their splits", async () => {
      const [a, b] = await createTrio();

      await services.expenseService.createExpense({
        description: "Coffee",
        amount: 7,
        currency: "USD",
        payer_id: a.id,
        splits: [
          { user_id: a.id, amount: 3.5, percentage: 50 },
          { user_id: b.id, amount: 3.5, percentage: 50 },
        ],
      });
      await services.expenseService.createExpense({
        description: "Train",
        amount: 12.346,
        currency: "EUR",
        payer_id: b.id,
        splits: [{ user_id: b.id, amount: 12.346 }],
      });

      expect(await services.expenseService.listExpenses()).toEqual([
        {
          id: 2,
          description: "Train",
          amount: 12.35,
          currency: "EUR",
          payer_id: 2,
          splits: [{ id: 3, user_id: 2, amount: 12.35, percentage: null }],
        },
        {
          id: 1,
          description: "Coffee",
          amount: 7,
          currency: "USD",
          payer_id: 1,
          splits: [
            { id: 1, user_id: 1, amount: 3.5, percentage: 50 },
            { id: 2, user_id: 2, amount: 3.5, percentage: 50 },
          ],
        },
      ]);
    });

    it("should delete an expense together with its splits", async () => {
      const [a, b] = await createTrio();
      const expense = await services.expenseService.createExpense({
        description: "Coffee",
        amount: 7,
        currency: "USD",
        payer_id: a.id,
        splits: [
          { user_id: a.id, amount: 3.5 },
          { user_id: b.id, amount: 3.5 },
        ],
      });

      await services.expenseService.deleteExpense(expense.id);

      expect(await new ExpenseRepo(db).findAllSplits()).toEqual([]);
      expect((await services.balanceService.getBalances())[1].total_paid).toBe(0);
      await expect(services.expenseService.getExpense(expense.id)).rejects.toThrow(NotFoundError);
      await expect(services.expenseService.deleteExpense(expense.id)).rejects.toThrow(
        "expense not found"
      );
    });
  });

  describe("balances and reports", () => {
    it("should conserve the group total across uneven splits", async () => {
      const [a, b, c] = await createTrio();
      const ids = [a.id, b.id, c.id];

      const amounts = [10, 100, 0.3, 45.5];
      for (const [index, amount] of amounts.entries()) {
        const third = Math.floor((amount / 3) * 100) / 100;
        await services.expenseService.createExpense({
          description: `Expense ${index}`,
          amount,
          currency: "USD",
          payer_id: ids[index % 3],
          splits: [
            { user_id: a.id, amount: third },
            { user_id: b.id, amount: third },
            { user_id: c.id, amount: amount - 2 * third },
          ],
        });
      }

      const balances = Object.values(await services.balanceService.getBalances());
      const netSum = balances.reduce((sum, balance) => sum + balance.net_balance, 0);

      expect(Math.abs(netSum)).toBeLessThanOrEqual(amounts.length * 0.01);
      for (const balance of balances) {
        expect(balance.net_balance).toBeCloseTo(balance.total_paid - balance.total_owes, 10);
      }
    });

    it("should build a personal report of paid and owed records", async () => {
      const [a, b] = await createTrio();
      await services.expenseService.createExpense({
        description: "Dinner",
        amount: 30,
        currency: "USD",
        payer_id: a.id,
        splits: [
          { user_id: a.id, amount: 15, percentage: 50 },
          { user_id: b.id, amount: 15, percentage: 50 },
        ],
      });
      await services.expenseService.createExpense({
        description: "Tickets",
        amount: 20.006,
        currency: "EUR",
        payer_id: b.id,
        splits: [{ user_id: a.id, amount: 20.006 }],
      });

      expect(await services.balanceService.getUserReport(a.id)).toEqual({
        paid: [{ description: "Dinner", amount: 30, currency: "USD" }],
        owes: [
          { description: "Dinner", amount: 15, currency: "USD", percentage: 50 },
          { description: "Tickets", amount: 20.01, currency: "EUR", percentage: null },
        ],
      });
    });

    it("should report NotFound for an unknown user", async () => {
      await expect(services.balanceService.getUserReport(999)).rejects.toThrow(
        new NotFoundError("user not found")
      );
    });

    it("should leave every listing empty after clearAll", async () => {
      const [a, b] = await createTrio();
      await services.expenseService.createExpense({
        description: "Coffee",
        amount: 7,
        currency: "USD",
        payer_id: a.id,
        splits: [
          { user_id: a.id, amount: 3.5 },
          { user_id: b.id, amount: 3.5 },
        ],
      });

      await services.balanceService.clearAll();

      expect(await services.userService.listUsers()).toEqual([]);
      expect(await services.expenseService.listExpenses()).toEqual([]);
      expect(await services.balanceService.getBalances()).toEqual({});
    });
  });
});
