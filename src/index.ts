import { createApp } from "./app";
import { closeSQLClient } from "./db";
import { env } from "./config/env";
import logger from "./utils/logger";

const app = createApp();

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, `Inventory API running on port ${env.PORT}`);
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    closeSQLClient()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Failed to close database pool");
        process.exit(1);
      });
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
