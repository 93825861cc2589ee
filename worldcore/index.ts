// worldcore/index.ts

// Config
export * from "./config/ArenaConfig";
export * from "./config/logconfig";

// Shared model
export * from "./shared/Entity";
export * from "./shared/PlayerTypes";
export * from "./shared/Session";
export * from "./shared/messages";
export * from "./shared/errors";

// Wire
export * from "./protocol/FrameCodec";
export * from "./protocol/CloseCodes";

// Sync
export * from "./sync/EntityDelta";
export * from "./sync/WorldHistory";
export * from "./sync/SnapshotEncoder";

// Runtime
export * from "./core/OutboundQueue";
export * from "./core/Broadcaster";
export * from "./core/SessionManager";
export * from "./core/MessageRouter";
export * from "./core/TickEngine";
export * from "./core/Heartbeat";
export * from "./core/ArenaRuntime";

// Simulation hook
export * from "./sim/Simulation";
export * from "./sim/DemoSimulation";

// Leaderboard / chat / auth
export * from "./leaderboard/LeaderboardService";
export * from "./leaderboard/LeaderboardPublisher";
export * from "./chat/ChatService";
export * from "./chat/ModerationFilter";
export * from "./auth/TokenVerifier";
export * from "./auth/BotClassifier";

// Persistence
export * from "./persistence/PlayerStore";
export * from "./persistence/InMemoryPlayerStore";
export * from "./persistence/PostgresPlayerStore";
export * from "./persistence/RetryBuffer";
export * from "./persistence/PersistenceGateway";

// Utils
export * from "./utils/logger";
export * from "./utils/RateLimiter";
export * from "./utils/Rng";
