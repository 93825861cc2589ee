// admin-backend/routes/adminMute.ts
//
// Route base: /api/admin/mute (behind requireAdmin)
//   POST { playerId, muted }

import { Router } from "express";
import { z } from "zod";

import { Logger } from "../../worldcore/utils/logger";
import type { AdminDeps, HandlerResult } from "../AdminDeps";

const log = Logger.scope("ADMIN");

const adminMuteSchema = z.object({
  playerId: z.string().trim().min(1).max(128),
  muted: z.boolean(),
});

export async function adminMuteResponse(deps: AdminDeps, body: unknown): Promise<HandlerResult> {
  const parsed = adminMuteSchema.safeParse(body);
  if (!parsed.success) {
    return { status: 400, body: { error: "playerId and muted (boolean) required" } };
  }

  const { playerId, muted } = parsed.data;
  const res = await deps.setMuted(playerId, muted);
  switch (res.status) {
    case "unknown_player":
      return { status: 404, body: { error: "unknown_player" } };
    case "unavailable":
      log.warn("Mute not stored; player offline and storage down", { playerId, error: res.error });
      return { status: 503, body: { error: "storage_unavailable" } };
    case "updated":
      return { status: 200, body: { ok: true, playerId, muted, sessions: res.sessions, persisted: res.persisted } };
  }
}

export function adminMuteRouter(deps: AdminDeps): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    try {
      const out = await adminMuteResponse(deps, req.body);
      res.status(out.status).json(out.body);
    } catch (err) {
      log.error("Error changing mute", { err });
      res.status(500).json({ error: "internal_error" });
    }
  });

  return router;
}
