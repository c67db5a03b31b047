// backend/services/employee/src/routes/employeeRoutes.ts
import { Router } from "express";
import type { Database } from "../db";

// Direct handler imports (no barrels)
import { create } from "../controllers/employee/handlers/create";
import { findById } from "../controllers/employee/handlers/findById";

export interface BuildEmployeeRouterDeps {
  db: Database;
}

export function buildEmployeeRouter(deps: BuildEmployeeRouterDeps): Router {
  const router = Router();

  router.post("/", create(deps.db));
  router.get("/:id", findById(deps.db));

  return router;
}
