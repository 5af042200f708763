import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import type { Logger } from "../../logger.js";

/**
 * Attach a request id and a child logger to every request, echo the id back
 * in `x-request-id`, and log the outcome once the response is sent.
 */
export function requestContext(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = req.get("x-request-id") || randomUUID();
    const requestLogger = logger.child({ requestId });
    const startedAt = Date.now();

    res.locals.logger = requestLogger;
    res.setHeader("x-request-id", requestId);

    res.on("finish", () => {
      requestLogger.info(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "request completed"
      );
    });

    next();
  };
}
