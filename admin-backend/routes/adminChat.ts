// admin-backend/routes/adminChat.ts
//
// Route base: /api/admin/chat (behind requireAdmin)

import { Router } from "express";
import { z } from "zod";

import { Logger } from "../../worldcore/utils/logger";
import type { AdminDeps, HandlerResult } from "../AdminDeps";

const log = Logger.scope("ADMIN");

const adminChatSchema = z.object({
  text: z.string().trim().min(1).max(256),
  from: z.string().trim().min(1).max(32).default("admin"),
});

export function adminChatResponse(deps: AdminDeps, body: unknown): HandlerResult {
  const parsed = adminChatSchema.safeParse(body);
  if (!parsed.success) {
    log.warn("Invalid admin chat body", { issues: parsed.error.issues });
    return { status: 400, body: { error: "text required (1-256 chars)" } };
  }

  const recipients = deps.broadcastChat(parsed.data.text, parsed.data.from);
  log.info("Admin chat sent", { from: parsed.data.from, recipients });
  return { status: 200, body: { ok: true, recipients } };
}

export function adminChatRouter(deps: AdminDeps): Router {
  const router = Router();

  router.post("/", (req, res) => {
    const out = adminChatResponse(deps, req.body);
    res.status(out.status).json(out.body);
  });

  return router;
}
