// worldcore/config/ArenaConfig.ts
//
// Configuration surface for one arena process. Everything comes from
// ARENA_* env vars (load .env with dotenv before calling loadArenaConfig),
// with human-readable defaults below.

import { z } from "zod";

// Defaults
const DEFAULT_TICK_INTERVAL_MS = 50; // 20 TPS
const DEFAULT_HEARTBEAT_INTERVAL_MS = 5_000;
const DEFAULT_IDLE_TIMEOUT_MS = 60_000;
const DEFAULT_DRAIN_GRACE_MS = 5_000;

function envNumber(def: number) {
  return z.preprocess(
    (v) => (v === undefined || v === "" ? undefined : Number(v)),
    z.number().finite().default(def),
  );
}

function envInt(def: number, min = 0) {
  return z.preprocess(
    (v) => (v === undefined || v === "" ? undefined : Number(v)),
    z.number().int().min(min).default(def),
  );
}

function envBool(def: boolean) {
  return z.preprocess((v) => {
    if (v === undefined || v === "") return undefined;
    const s = String(v).toLowerCase();
    return s === "true" || s === "1" || s === "yes";
  }, z.boolean().default(def));
}

const ArenaConfigSchema = z
  .object({
    regionId: z.string().min(1).default("local"),

    // Sockets
    host: z.string().default("0.0.0.0"),
    port: envInt(7777, 1),
    path: z.string().startsWith("/").default("/arena"),
    adminPort: envInt(7778, 1),
    adminToken: z.string().optional(),

    // Auth / handshake
    authOptional: envBool(true),
    jwtSecret: z.string().min(1).default("dev-secret"),
    rejectBots: envBool(true),
    maxSessions: envInt(500, 1),
    handshakeRateLimitMs: envInt(1_000, 1),
    handshakeBurst: envInt(5, 1),

    // Backing store
    store: z.enum(["memory", "postgres"]).default("memory"),
    storeNamespace: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, "namespace must be a lowercase SQL identifier")
      .default("arena"),

    // Tick + session lifecycle
    tickIntervalMs: envInt(DEFAULT_TICK_INTERVAL_MS, 5),
    heartbeatIntervalMs: envInt(DEFAULT_HEARTBEAT_INTERVAL_MS, 100),
    idleTimeoutMs: envInt(DEFAULT_IDLE_TIMEOUT_MS, 1),
    drainGraceMs: envInt(DEFAULT_DRAIN_GRACE_MS, 0),
    maxConsecutiveMalformed: envInt(3, 1),

    // Outbound queues
    queueCapacity: envInt(32, 1),
    criticalOverflowCap: envInt(256, 1),
    socketHighWaterMark: envInt(256 * 1024, 1),

    // Snapshot encoder
    historyTicks: envInt(32, 2),
    recencyWindowTicks: envInt(30, 1),
    epsilon: envNumber(1e-3),

    // Leaderboard
    leaderboardPublishEveryTicks: envInt(20, 1),
    leaderboardSize: envInt(10, 1),
    periodLeaderboardSize: envInt(15, 1),

    // Persistence retries
    retryBaseMs: envInt(500, 1),
    retryMaxMs: envInt(30_000, 1),
    retryBufferCapacity: envInt(256, 1),
    retryIntervalMs: envInt(250, 10),

    // Chat
    chatRateLimitMs: envInt(1_000, 1),
    chatBurst: envInt(3, 1),
    chatMaxLength: envInt(256, 1),

    // Metrics
    metricsIntervalMs: envInt(60_000, 1_000),
    metricsRetention: envInt(60, 1),
  })
  .refine((c) => c.recencyWindowTicks <= c.historyTicks, {
    message: "recencyWindowTicks must not exceed historyTicks",
    path: ["recencyWindowTicks"],
  })
  .refine((c) => c.retryBaseMs <= c.retryMaxMs, {
    message: "retryBaseMs must not exceed retryMaxMs",
    path: ["retryBaseMs"],
  });

export type ArenaConfig = z.infer<typeof ArenaConfigSchema>;

type Env = Record<string, string | undefined>;

export function loadArenaConfig(env: Env = process.env): ArenaConfig {
  return ArenaConfigSchema.parse({
    regionId: env.ARENA_REGION || undefined,
    host: env.ARENA_HOST || undefined,
    port: env.ARENA_PORT,
    path: env.ARENA_PATH || undefined,
    adminPort: env.ARENA_ADMIN_PORT,
    adminToken: env.ARENA_ADMIN_TOKEN || undefined,
    authOptional: env.ARENA_AUTH_OPTIONAL,
    jwtSecret: env.ARENA_AUTH_JWT_SECRET || undefined,
    rejectBots: env.ARENA_REJECT_BOTS,
    maxSessions: env.ARENA_MAX_SESSIONS,
    handshakeRateLimitMs: env.ARENA_HANDSHAKE_RATE_MS,
    handshakeBurst: env.ARENA_HANDSHAKE_BURST,
    store: env.ARENA_STORE || undefined,
    storeNamespace: env.ARENA_STORE_NAMESPACE || undefined,
    tickIntervalMs: env.ARENA_TICK_INTERVAL,
    heartbeatIntervalMs: env.ARENA_HEARTBEAT_INTERVAL,
    idleTimeoutMs: env.ARENA_IDLE_TIMEOUT,
    drainGraceMs: env.ARENA_DRAIN_GRACE,
    maxConsecutiveMalformed: env.ARENA_MAX_MALFORMED,
    queueCapacity: env.ARENA_QUEUE_CAPACITY,
    criticalOverflowCap: env.ARENA_CRITICAL_OVERFLOW_CAP,
    socketHighWaterMark: env.ARENA_SOCKET_HWM,
    historyTicks: env.ARENA_HISTORY_TICKS,
    recencyWindowTicks: env.ARENA_RECENCY_WINDOW,
    epsilon: env.ARENA_EPSILON,
    leaderboardPublishEveryTicks: env.ARENA_LEADERBOARD_EVERY,
    leaderboardSize: env.ARENA_LEADERBOARD_SIZE,
    periodLeaderboardSize: env.ARENA_PERIOD_LEADERBOARD_SIZE,
    retryBaseMs: env.ARENA_RETRY_BASE_MS,
    retryMaxMs: env.ARENA_RETRY_MAX_MS,
    retryBufferCapacity: env.ARENA_RETRY_BUFFER,
    retryIntervalMs: env.ARENA_RETRY_INTERVAL,
    chatRateLimitMs: env.ARENA_CHAT_RATE_MS,
    chatBurst: env.ARENA_CHAT_BURST,
    chatMaxLength: env.ARENA_CHAT_MAX_LENGTH,
    metricsIntervalMs: env.ARENA_METRICS_INTERVAL,
    metricsRetention: env.ARENA_METRICS_RETENTION,
  });
}
