import "dotenv/config";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { loadConfig } from "../config/index.js";
import { createLogger } from "../logger.js";
import { createDatabase } from "../storage/index.js";
import { createServices } from "../services/index.js";
import { createApp } from "./app.js";

const config = loadConfig();
const logger = createLogger({ level: config.LOG_LEVEL });

if (config.DATABASE_PATH !== ":memory:") {
  mkdirSync(dirname(config.DATABASE_PATH), { recursive: true });
}

const { db, close } = createDatabase(config.DATABASE_PATH);
const app = createApp(createServices(db), logger);

const server = app.listen(config.PORT, () => {
  logger.info(
    { port: config.PORT, databasePath: config.DATABASE_PATH, env: config.NODE_ENV },
    "expense ledger API listening"
  );
});

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, "error while closing server");
    }
    close();
    process.exit(error ? 1 : 0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
