// admin-backend/index.ts
//
// Read-only status + admin HTTP API for one arena, on its own port.
// Runs in the arena process so it can read live state directly.

import cors from "cors";
import express, { Express } from "express";
import http from "http";

import { Logger } from "../worldcore/utils/logger";
import type { AdminDeps } from "./AdminDeps";
import { requireAdmin } from "./middleware/adminAuth";
import { adminChatRouter } from "./routes/adminChat";
import { adminMetricsRouter } from "./routes/adminMetrics";
import { adminMuteRouter } from "./routes/adminMute";
import { healthRouter } from "./routes/health";
import { leaderboardRouter } from "./routes/leaderboard";

const log = Logger.scope("ADMIN");

export function createAdminApp(deps: AdminDeps): Express {
  const app = express();

  app.use(cors({ origin: "*" }));
  app.use(express.json({ limit: "16kb" }));

  app.get("/", (_req, res) => {
    res.json({ ok: true, message: "Arena admin API online." });
  });

  app.use("/api/health", healthRouter(deps));
  app.use("/api/leaderboard", leaderboardRouter(deps));
  app.use("/api/admin", requireAdmin(deps.adminToken));
  app.use("/api/admin/chat", adminChatRouter(deps));
  app.use("/api/admin/mute", adminMuteRouter(deps));
  app.use("/api/admin/metrics", adminMetricsRouter(deps));

  return app;
}

export function startAdminServer(deps: AdminDeps, opts: { host: string; port: number }): http.Server {
  const server = http.createServer(createAdminApp(deps));

  server.listen(opts.port, opts.host, () => {
    log.success("Admin API listening", {
      host: opts.host,
      port: opts.port,
      adminEnabled: Boolean(deps.adminToken),
    });
  });

  server.on("error", (err) => {
    log.error("Admin API server error", { err });
  });

  return server;
}
