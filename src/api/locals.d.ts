import type { Logger } from "../logger.js";

declare global {
  namespace Express {
    interface Locals {
      logger: Logger;
    }
  }
}

export {};
