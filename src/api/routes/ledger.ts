import express, { type Router } from "express";
import type { BalanceService } from "../../services/index.js";
import { NotFoundError } from "../../errors/index.js";
import { idSchema } from "../../validation/index.js";
import { asyncHandler } from "../middleware/errors.js";

export function ledgerRouter(balanceService: BalanceService): Router {
  const router = express.Router();

  // GET /balances - user_id -> paid/owes/net
  router.get(
    "/balances",
    asyncHandler(async (_req, res) => {
      res.json(await balanceService.getBalances());
    })
  );

  // GET /user_report/:id - One user's paid expenses and owed splits
  router.get(
    "/user_report/:id",
    asyncHandler(async (req, res) => {
      const userId = idSchema.safeParse(req.params.id);
      if (!userId.success) {
        throw new NotFoundError("user not found");
      }
      res.json(await balanceService.getUserReport(userId.data));
    })
  );

  // POST /clear_all - Development only: wipes every user, expense and split
  router.post(
    "/clear_all",
    asyncHandler(async (_req, res) => {
      await balanceService.clearAll();
      res.locals.logger.warn("ledger cleared");
      res.json({ status: "cleared" });
    })
  );

  return router;
}
