import express, { type Router } from "express";
import type { ExpenseService } from "../../services/index.js";
import { NotFoundError } from "../../errors/index.js";
import { idSchema } from "../../validation/index.js";
import { asyncHandler } from "../middleware/errors.js";

function expenseIdParam(raw: string): number {
  const parsed = idSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError("expense not found");
  }
  return parsed.data;
}

export function expensesRouter(expenseService: ExpenseService): Router {
  const router = express.Router();

  // GET /expenses - Newest first, with splits
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.json(await expenseService.listExpenses());
    })
  );

  // POST /expenses - Validate and store an expense with its splits
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const expense = await expenseService.createExpense(req.body);
      res.locals.logger.info(
        { expenseId: expense.id, splits: expense.splits.length },
        "expense created"
      );
      res.status(201).json({ id: expense.id });
    })
  );

  // GET /expenses/:id
  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json(await expenseService.getExpense(expenseIdParam(req.params.id)));
    })
  );

  // DELETE /expenses/:id - Removes the expense and its splits
  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      await expenseService.deleteExpense(expenseIdParam(req.params.id));
      res.json({ status: "deleted" });
    })
  );

  return router;
}
