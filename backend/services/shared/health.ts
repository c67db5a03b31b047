// backend/services/shared/health.ts
import express from "express";

export type DependencyProbe = () => Promise<boolean>;

export interface HealthBody {
  status: "ok";
  db: "ok" | "down";
}

type Options = {
  /** Live dependency check; must resolve false instead of throwing. */
  probe: DependencyProbe;
};

/**
 * GET /health
 * - 200 {status:"ok", db:"ok"}   dependency reachable
 * - 503 {status:"ok", db:"down"} process alive, dependency not
 *
 * One probe per call, no caching, no retry.
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();

  router.get("/health", async (_req, res) => {
    let up = false;
    try {
      up = await opts.probe();
    } catch {
      up = false;
    }
    const body: HealthBody = { status: "ok", db: up ? "ok" : "down" };
    res.status(up ? 200 : 503).json(body);
  });

  return router;
}
