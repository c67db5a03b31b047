// backend/services/employee/src/app.ts
import express, { type Express } from "express";
import type { Logger } from "pino";
import { coreMiddleware } from "../../shared/middleware/core";
import { makeHttpLogger } from "../../shared/middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../../shared/middleware/problemJson";
import { createHealthRouter } from "../../shared/health";
import { logger as sharedLogger } from "../../shared/utils/logger";

import type { Database } from "./db";
import { buildEmployeeRouter } from "./routes/employeeRoutes";
import { SERVICE_NAME } from "./config";

export const ROOT_MESSAGE = "Employee service is running. Check /health.";

export interface AppDeps {
  db: Database;
  logger?: Logger;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", true);

  // Shared middleware
  app.use(makeHttpLogger(SERVICE_NAME, deps.logger ?? sharedLogger));
  app.use(coreMiddleware());

  // Health (live ping every call)
  app.use(createHealthRouter({ probe: () => deps.db.ping() }));

  app.get("/", (_req, res) => {
    res.json({ message: ROOT_MESSAGE });
  });

  // Routes
  app.use("/employees", buildEmployeeRouter({ db: deps.db }));

  // 404 + error handlers
  app.use(notFoundProblemJson(["/employees"]));
  app.use(errorProblemJson());

  return app;
}
