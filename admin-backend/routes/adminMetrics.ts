// admin-backend/routes/adminMetrics.ts
//
// Route base: /api/admin/metrics (behind requireAdmin)
//   GET /          current interval plus the retained completed ones
//   GET /?last=N   only the N most recent completed intervals

import { Router } from "express";
import { z } from "zod";

import type { AdminDeps, HandlerResult } from "../AdminDeps";

const metricsQuerySchema = z.object({
  last: z.coerce.number().int().min(0).max(1000).optional(),
});

export function adminMetricsResponse(deps: AdminDeps, last: unknown): HandlerResult {
  const parsed = metricsQuerySchema.safeParse({ last });
  if (!parsed.success) {
    return { status: 400, body: { error: "invalid_query" } };
  }

  const summary = deps.metrics();
  const n = parsed.data.last;
  const completed = n === undefined ? summary.completed : summary.completed.slice(Math.max(0, summary.completed.length - n));
  return {
    status: 200,
    body: { ok: true, intervalMs: summary.intervalMs, current: summary.current, completed },
  };
}

export function adminMetricsRouter(deps: AdminDeps): Router {
  const router = Router();

  router.get("/", (req, res) => {
    const out = adminMetricsResponse(deps, req.query.last);
    res.status(out.status).json(out.body);
  });

  return router;
}
