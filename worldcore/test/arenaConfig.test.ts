// worldcore/test/arenaConfig.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { loadArenaConfig } from "../config/ArenaConfig";

test("an empty environment yields the documented defaults", () => {
  const cfg = loadArenaConfig({});

  assert.equal(cfg.port, 7777);
  assert.equal(cfg.path, "/arena");
  assert.equal(cfg.tickIntervalMs, 50);
  assert.equal(cfg.authOptional, true);
  assert.equal(cfg.rejectBots, true);
  assert.equal(cfg.store, "memory");
  assert.equal(cfg.storeNamespace, "arena");
  assert.equal(cfg.historyTicks, 32);
  assert.equal(cfg.recencyWindowTicks, 30);
  assert.equal(cfg.epsilon, 1e-3);
  assert.equal(cfg.adminToken, undefined);
  assert.equal(cfg.periodLeaderboardSize, 15);
  assert.equal(cfg.metricsIntervalMs, 60_000);
  assert.equal(cfg.metricsRetention, 60);
});

test("ARENA_* variables override defaults", () => {
  const cfg = loadArenaConfig({
    ARENA_PORT: "9000",
    ARENA_AUTH_OPTIONAL: "false",
    ARENA_REJECT_BOTS: "0",
    ARENA_STORE: "postgres",
    ARENA_STORE_NAMESPACE: "arena_eu",
    ARENA_EPSILON: "0.05",
    ARENA_ADMIN_TOKEN: "test-admin-token",
    ARENA_CHAT_BURST: "",
  });

  assert.equal(cfg.port, 9000);
  assert.equal(cfg.authOptional, false);
  assert.equal(cfg.rejectBots, false);
  assert.equal(cfg.store, "postgres");
  assert.equal(cfg.storeNamespace, "arena_eu");
  assert.equal(cfg.epsilon, 0.05);
  assert.equal(cfg.adminToken, "test-admin-token");
  assert.equal(cfg.chatBurst, 3);
});

test("invalid values are rejected at load", () => {
  assert.throws(() => loadArenaConfig({ ARENA_PORT: "abc" }));
  assert.throws(() => loadArenaConfig({ ARENA_STORE: "mongo" }));
  assert.throws(() => loadArenaConfig({ ARENA_STORE_NAMESPACE: "Bad-NS" }));
  assert.throws(() => loadArenaConfig({ ARENA_HISTORY_TICKS: "10", ARENA_RECENCY_WINDOW: "20" }));
  assert.throws(() => loadArenaConfig({ ARENA_RETRY_BASE_MS: "5000", ARENA_RETRY_MAX_MS: "1000" }));
});
