// arena-backend/server.ts

import http from "http";

import { startAdminServer } from "../admin-backend/index";
import { ArenaRuntime, DemoSimulation, Logger, PostgresPlayerStore } from "../worldcore";
import { ArenaSocketServer } from "./ArenaSocketServer";
import { arenaConfig } from "./config";
import { installFileLogTap } from "./FileLogTap";

installFileLogTap();

const log = Logger.scope("SERVER");

async function main(): Promise<void> {
  const cfg = arenaConfig;

  log.info("Starting arena server...", {
    region: cfg.regionId,
    host: cfg.host,
    port: cfg.port,
    path: cfg.path,
    store: cfg.store,
  });

  const runtime = new ArenaRuntime(cfg, { simulation: new DemoSimulation() });

  if (runtime.store instanceof PostgresPlayerStore) {
    const { testDbConnection } = await import("../worldcore/db/Database");
    if (!(await testDbConnection())) {
      throw new Error("Postgres unreachable at startup");
    }
    await runtime.store.ensureSchema();
  }

  const server = http.createServer();
  const arena = new ArenaSocketServer(runtime, server, cfg.path);

  const admin = startAdminServer(
    {
      adminToken: cfg.adminToken,
      health: () => runtime.health(),
      liveLeaderboard: () => runtime.publisher.current(),
      readLeaderboard: (period, limit) => runtime.gateway.readLeaderboard(period, limit),
      broadcastChat: (text, from) => runtime.sessions.chat.systemBroadcast(text, from),
      setMuted: (playerId, muted) => runtime.setMuted(playerId, muted),
      metrics: () => runtime.metrics.summary(),
    },
    { host: cfg.host, port: cfg.adminPort },
  );

  runtime.start();

  server.listen(cfg.port, cfg.host, () => {
    log.success("Arena listening", {
      host: cfg.host,
      port: cfg.port,
      path: cfg.path,
      authOptional: cfg.authOptional,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Signal received", { signal });

    arena.close();
    admin.close();

    runtime
      .shutdown()
      .then((lost) => {
        server.close();
        process.exit(lost > 0 ? 1 : 0);
      })
      .catch((err) => {
        log.error("Shutdown failed", { err });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("Fatal error in arena server", { err });
  process.exit(1);
});
