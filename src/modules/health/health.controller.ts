// src/modules/health/health.controller.ts
// Service + database health endpoints. Never throw; degrade to 503.

import { Router, type Request, type Response } from "express";
import { pingDatabase, type DatabaseHandle } from "../../lib/db";
import { log } from "../../lib/observability/logger";

export function createHealthRouter(
  database: DatabaseHandle,
  mode: string,
): Router {
  const router: Router = Router();

  ////////////////////////////////////////////////////////////////
  // Service Health
  ////////////////////////////////////////////////////////////////

  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "online",
      mode,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  ////////////////////////////////////////////////////////////////
  // Database Health
  ////////////////////////////////////////////////////////////////

  router.get("/health/db", (_req: Request, res: Response) => {
    const checkedAt = new Date().toISOString();

    try {
      const ok = pingDatabase(database);
      res.status(ok ? 200 : 503).json({ ok, checkedAt });
    } catch (error) {
      log("ERROR", "DB_HEALTH_CHECK_FAILED", {
        message: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        ok: false,
        error: "Database health check failed",
        checkedAt,
      });
    }
  });

  return router;
}
