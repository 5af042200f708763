import express, { type Router } from "express";
import type { UserService } from "../../services/index.js";
import { asyncHandler } from "../middleware/errors.js";

export function usersRouter(userService: UserService): Router {
  const router = express.Router();

  // GET /users - All users, ordered by id
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.json(await userService.listUsers());
    })
  );

  // POST /users - Register a user
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const user = await userService.createUser(req.body);
      res.locals.logger.info({ userId: user.id }, "user created");
      res.status(201).json(user);
    })
  );

  return router;
}
