// backend/services/employee/index.ts
import "./src/bootstrap"; // loads env + sets SERVICE_NAME

import { createApp } from "./src/app";
import { loadConfig, SERVICE_NAME } from "./src/config";
import { Database } from "./src/db";
import { StartupReadiness } from "./src/readiness";
import { logger } from "../shared/utils/logger";
import { startHttpService } from "../shared/bootstrap/startHttpService";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const config = loadConfig();
  const db = Database.fromConfig(config.db, logger);

  // Bind first; readiness only gates db.dbReady.
  await startHttpService({
    app: createApp({ db, logger }),
    host: config.app.host,
    port: config.app.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: () => db.close(),
  });

  const readiness = new StartupReadiness(db, {
    maxAttempts: config.startup.maxRetries,
    maxBackoffSec: config.startup.maxBackoffSec,
    logger,
  });
  await readiness.run();
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
