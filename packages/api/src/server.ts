import { serve } from "@hono/node-server";

import { createApp } from "./app.js";
import { createDb } from "./db/index.js";
import { loadConfig } from "./lib/config.js";
import { logger } from "./lib/logger.js";
import { createDbAccountDirectory } from "./services/accounts.js";

const config = loadConfig();
logger.level = config.logLevel;

const { db, sql } = createDb({ url: config.databaseUrl, poolSize: config.databasePoolSize });
const app = createApp({
  db,
  accounts: createDbAccountDirectory(db),
  apiKeyPepper: config.apiKeyHashPepper,
  corsOrigins: config.corsOrigins,
  authFailureLimit: config.authFailureLimit,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, "api listening");
});

function shutdown(signal: string) {
  logger.info({ signal }, "shutting down");
  server.close(() => {
    sql.end({ timeout: 5 }).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Failed to close database pool");
        process.exit(1);
      }
    );
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
