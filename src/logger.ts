import pino from "pino";

export type Logger = pino.Logger;

/**
 * Structured JSON logger with ISO timestamps.
 * Logs at `info` unless `options.level` is given.
 */
export function createLogger(options?: pino.LoggerOptions): Logger {
  return pino({
    level: "info",
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}
