// admin-backend/routes/leaderboard.ts
//
// Route base: /api/leaderboard
//   GET /          live top list (what sessions were last sent)
//   GET /:period   persisted best scores for all | week | day

import { Router } from "express";
import { z } from "zod";

import { Logger } from "../../worldcore/utils/logger";
import type { AdminDeps, HandlerResult } from "../AdminDeps";

const log = Logger.scope("ADMIN");

const periodQuerySchema = z.object({
  period: z.enum(["all", "week", "day"]),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function liveLeaderboardResponse(deps: AdminDeps): HandlerResult {
  return { status: 200, body: { ok: true, entries: [...deps.liveLeaderboard()] } };
}

export async function periodLeaderboardResponse(
  deps: AdminDeps,
  period: unknown,
  limit: unknown,
): Promise<HandlerResult> {
  const parsed = periodQuerySchema.safeParse({ period, limit });
  if (!parsed.success) {
    return { status: 400, body: { error: "invalid_query", issues: parsed.error.issues.map((i) => i.message) } };
  }

  const res = await deps.readLeaderboard(parsed.data.period, parsed.data.limit);
  if (res.status === "unavailable") {
    log.warn("Period leaderboard unavailable", { period: parsed.data.period, error: res.error });
    return { status: 503, body: { error: "storage_unavailable" } };
  }

  return {
    status: 200,
    body: {
      ok: true,
      period: parsed.data.period,
      entries: res.entries.map((e, i) => ({
        rank: i + 1,
        playerId: e.playerId,
        displayName: e.displayName,
        score: e.score,
      })),
    },
  };
}

export function leaderboardRouter(deps: AdminDeps): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const out = liveLeaderboardResponse(deps);
    res.status(out.status).json(out.body);
  });

  router.get("/:period", async (req, res) => {
    try {
      const out = await periodLeaderboardResponse(deps, req.params.period, req.query.limit);
      res.status(out.status).json(out.body);
    } catch (err) {
      log.error("Error reading period leaderboard", { err });
      res.status(500).json({ error: "internal_error" });
    }
  });

  return router;
}
