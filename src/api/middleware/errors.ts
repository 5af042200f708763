import type { NextFunction, Request, RequestHandler, Response } from "express";
import { LedgerError } from "../../errors/index.js";
import type { Logger } from "../../logger.js";

// express.json() reports unparseable bodies as a SyntaxError tagged with this type
function isMalformedJson(error: unknown): boolean {
  return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

/** Forward rejections from async route handlers to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not Found" });
}

export function errorHandler(fallbackLogger: Logger) {
  return (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const logger = res.locals.logger ?? fallbackLogger;

    if (error instanceof LedgerError) {
      logger.warn({ kind: error.name, status: error.status }, error.message);
      res.status(error.status).json({ error: error.message });
      return;
    }

    if (isMalformedJson(error)) {
      logger.warn("malformed JSON body");
      res.status(400).json({ error: "malformed JSON body" });
      return;
    }

    logger.error({ err: error }, "unhandled error");
    res.status(500).json({ error: "Internal Server Error" });
  };
}
