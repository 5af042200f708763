import express, { type Express } from "express";
import type { Services } from "../services/index.js";
import type { Logger } from "../logger.js";
import { requestContext } from "./middleware/request-context.js";
import { errorHandler, notFoundHandler } from "./middleware/errors.js";
import { usersRouter } from "./routes/users.js";
import { expensesRouter } from "./routes/expenses.js";
import { ledgerRouter } from "./routes/ledger.js";

export function createApp(services: Services, logger: Logger): Express {
  const app = express();

  app.use(requestContext(logger));
  app.use(express.json());

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/users", usersRouter(services.userService));
  app.use("/expenses", expensesRouter(services.expenseService));
  app.use("/", ledgerRouter(services.balanceService));

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
