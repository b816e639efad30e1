// src/index.ts
import "reflect-metadata";
import type { Server } from "http";
import { config, configWarnings } from "./config";
import { createApp } from "./app";
import { createSequelize } from "./db/config";
import { createTokenVerifier } from "./services/bearer-token.service";
import { logger } from "./logger";

async function main() {
  for (const warning of configWarnings(config)) {
    logger.warn(warning);
  }

  const sequelize = createSequelize(config.db);
  await sequelize.authenticate();
  logger.info("Database connection ready");

  const { app, storage } = createApp({
    config,
    sequelize,
    tokenVerifier: createTokenVerifier(config.firebase),
  });

  await sequelize.sync();
  await storage.init();
  logger.info(`Uploads directory ready: ${storage.root}`);

  const server: Server = app.listen(config.port, () => {
    logger.info(`Media upload server listening on ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close((err) => {
      sequelize
        .close()
        .then(() => process.exit(err ? 1 : 0))
        .catch((closeErr: unknown) => {
          logger.error(`Error closing database: ${String(closeErr)}`);
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err : String(err));
  process.exit(1);
});
