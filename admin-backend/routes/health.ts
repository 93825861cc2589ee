// admin-backend/routes/health.ts
//
// Route base: /api/health

import { Router } from "express";

import type { HealthReport } from "../../worldcore/core/ArenaRuntime";
import type { AdminDeps, HandlerResult } from "../AdminDeps";

export function healthResponse(report: HealthReport): HandlerResult {
  // Degraded storage still serves players; only a stopping arena is "not ready".
  return {
    status: report.status === "stopping" ? 503 : 200,
    body: { ok: report.status !== "stopping", ...report },
  };
}

export function healthRouter(deps: AdminDeps): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const out = healthResponse(deps.health());
    res.status(out.status).json(out.body);
  });

  return router;
}
