// admin-backend/middleware/adminAuth.ts
//
// Bearer-token gate for /api/admin/*. The token comes from ARENA_ADMIN_TOKEN;
// without one, admin routes are disabled (503) rather than open.

import type { NextFunction, Request, RequestHandler, Response } from "express";
import crypto from "node:crypto";

import { Logger } from "../../worldcore/utils/logger";

const log = Logger.scope("ADMIN");

export function parseBearerToken(header: string | string[] | undefined): string | null {
  const raw = Array.isArray(header) ? header[0] : header;
  if (!raw) return null;
  const m = /^Bearer\s+(.+)$/i.exec(raw.trim());
  return m && m[1] ? m[1].trim() : null;
}

/** Constant-time compare over SHA-256 digests so lengths don't leak. */
export function tokenMatches(presented: string, expected: string): boolean {
  const a = crypto.createHash("sha256").update(presented).digest();
  const b = crypto.createHash("sha256").update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export type AdminCheck = { ok: true } | { ok: false; status: 401 | 503; error: string };

export function checkAdmin(authorization: string | string[] | undefined, adminToken: string | undefined): AdminCheck {
  if (!adminToken) return { ok: false, status: 503, error: "admin_disabled" };
  const token = parseBearerToken(authorization);
  if (!token || !tokenMatches(token, adminToken)) return { ok: false, status: 401, error: "unauthorized" };
  return { ok: true };
}

export function requireAdmin(adminToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const check = checkAdmin(req.headers["authorization"], adminToken);
    if (!check.ok) {
      log.warn("Admin request refused", { path: req.path, status: check.status });
      res.status(check.status).json({ error: check.error });
      return;
    }
    next();
  };
}
