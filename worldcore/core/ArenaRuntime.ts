// worldcore/core/ArenaRuntime.ts
//
// Composition root: wires config, store, encoder, broadcaster, sessions,
// leaderboard and tick driver into one object the transports use.

import { BotClassifier, UserAgentBotClassifier } from "../auth/BotClassifier";
import { JwtTokenVerifier, TokenVerifier } from "../auth/TokenVerifier";
import { loadModerationTerms, ModerationFilter, WordListFilter } from "../chat/ModerationFilter";
import type { ArenaConfig } from "../config/ArenaConfig";
import { LeaderboardPublisher } from "../leaderboard/LeaderboardPublisher";
import { LeaderboardService } from "../leaderboard/LeaderboardService";
import { InMemoryPlayerStore } from "../persistence/InMemoryPlayerStore";
import { PersistenceGateway, PersistenceStats } from "../persistence/PersistenceGateway";
import type { PlayerStore } from "../persistence/PlayerStore";
import { PostgresPlayerStore } from "../persistence/PostgresPlayerStore";
import type { PlayerId } from "../shared/PlayerTypes";
import type { CloseReason, SessionId } from "../shared/Session";
import type { Simulation } from "../sim/Simulation";
import { EncoderStats, SnapshotEncoder } from "../sync/SnapshotEncoder";
import { Logger } from "../utils/logger";
import { ArenaMetrics } from "./ArenaMetrics";
import { Broadcaster, BroadcastStats } from "./Broadcaster";
import { startHeartbeat } from "./Heartbeat";
import { SessionHealth, SessionManager } from "./SessionManager";
import { TickEngine, TickStats } from "./TickEngine";

const log = Logger.scope("SERVER");

export interface ArenaRuntimeOptions {
  simulation: Simulation;
  store?: PlayerStore;
  verifier?: TokenVerifier;
  classifier?: BotClassifier;
  filter?: ModerationFilter;
}

export type SessionClosedListener = (sessionId: SessionId, reason: CloseReason) => void;

export interface HealthReport {
  status: "ok" | "degraded" | "stopping";
  regionId: string;
  uptimeMs: number;
  tick: TickStats;
  sessions: SessionHealth;
  persistence: PersistenceStats;
  broadcast: BroadcastStats;
  encoder: EncoderStats;
  leaderboardSize: number;
}

export type SetMutedResult =
  | { status: "updated"; sessions: number; persisted: "stored" | "queued" | "dropped" | "not_found" | "unavailable" }
  | { status: "unknown_player" }
  | { status: "unavailable"; error: string };

export function createPlayerStore(cfg: Pick<ArenaConfig, "store" | "storeNamespace">): PlayerStore {
  return cfg.store === "postgres" ? new PostgresPlayerStore(cfg.storeNamespace) : new InMemoryPlayerStore();
}

export class ArenaRuntime {
  readonly encoder: SnapshotEncoder;
  readonly broadcaster: Broadcaster;
  readonly leaderboard: LeaderboardService;
  readonly publisher: LeaderboardPublisher;
  readonly gateway: PersistenceGateway;
  readonly sessions: SessionManager;
  readonly ticks: TickEngine;
  readonly store: PlayerStore;
  readonly metrics: ArenaMetrics;

  private readonly closedListeners: SessionClosedListener[] = [];
  private heartbeat: NodeJS.Timeout | null = null;
  private readonly startedAt = Date.now();
  private stopping = false;

  constructor(
    readonly config: ArenaConfig,
    opts: ArenaRuntimeOptions,
  ) {
    const sim = opts.simulation;

    this.store = opts.store ?? createPlayerStore(config);
    this.gateway = new PersistenceGateway(this.store, config);

    this.encoder = new SnapshotEncoder(config);
    this.broadcaster = new Broadcaster(
      {
        queueCapacity: config.queueCapacity,
        criticalOverflowCap: config.criticalOverflowCap,
        socketHighWaterMark: config.socketHighWaterMark,
        staleAfterMs: Math.floor(config.idleTimeoutMs / 2),
      },
      this.encoder,
    );

    this.metrics = new ArenaMetrics(
      { intervalMs: config.metricsIntervalMs, retention: config.metricsRetention },
      () => this.broadcaster.getStats(),
    );

    this.leaderboard = new LeaderboardService();
    this.publisher = new LeaderboardPublisher(
      this.leaderboard,
      this.broadcaster,
      { everyTicks: config.leaderboardPublishEveryTicks, size: config.leaderboardSize },
      (entries) => {
        // Guests' scores live only as long as their session.
        const kept = this.sessions.persistentPlayerIds();
        this.gateway.recordPeriodScores(entries.filter((e) => kept.has(e.playerId)));
      },
    );

    this.sessions = new SessionManager(config, {
      broadcaster: this.broadcaster,
      encoder: this.encoder,
      gateway: this.gateway,
      leaderboard: this.leaderboard,
      verifier: opts.verifier ?? new JwtTokenVerifier(config.jwtSecret),
      classifier: opts.classifier ?? new UserAgentBotClassifier(),
      filter: opts.filter ?? new WordListFilter(loadModerationTerms()),
      input: sim,
      onActivated: (sessionId) => {
        this.broadcaster.sendLeaderboard(sessionId, this.publisher.fullBody());
        sim.onSessionActive?.(sessionId);
      },
      onClosed: (sessionId, reason) => this.emitClosed(sessionId, reason),
      metrics: this.metrics,
    });

    this.ticks = new TickEngine(sim, this.sessions, this.leaderboard, this.broadcaster, this.publisher, {
      intervalMs: config.tickIntervalMs,
    });

    this.onSessionClosed((sessionId) => sim.onSessionClosed?.(sessionId));
  }

  onSessionClosed(listener: SessionClosedListener): void {
    this.closedListeners.push(listener);
  }

  start(): void {
    this.ticks.start();
    this.heartbeat = startHeartbeat(this.sessions, {
      intervalMs: this.config.heartbeatIntervalMs,
      onSwept: (live, now) => this.metrics.observe(live, now),
    });
    this.gateway.startRetryLoop(this.config.retryIntervalMs);
    log.success("Arena runtime started", {
      region: this.config.regionId,
      store: this.store.kind,
      tickIntervalMs: this.config.tickIntervalMs,
    });
  }

  health(now = Date.now()): HealthReport {
    const persistence = this.gateway.stats();
    return {
      status: this.stopping ? "stopping" : persistence.available ? "ok" : "degraded",
      regionId: this.config.regionId,
      uptimeMs: now - this.startedAt,
      tick: this.ticks.stats(),
      sessions: this.sessions.health(),
      persistence,
      broadcast: this.broadcaster.getStats(),
      encoder: this.encoder.getStats(),
      leaderboardSize: this.leaderboard.size,
    };
  }

  /**
   * Mute or unmute a player: live sessions change at once, and the stored
   * record is rewritten as of `now` so it wins over older final writes.
   */
  async setMuted(playerId: PlayerId, muted: boolean, now = Date.now()): Promise<SetMutedResult> {
    const sessions = this.sessions.setMuted(playerId, muted);

    const loaded = await this.gateway.loadPlayer(playerId);
    switch (loaded.status) {
      case "found": {
        const { record } = loaded;
        const res = await this.gateway.upsertPlayer(
          {
            ...record,
            moderation: { ...record.moderation, muted },
            lastSeenAt: Math.max(record.lastSeenAt, now),
          },
          { now },
        );
        log.info("Player mute changed", { playerId, muted, sessions, persisted: res.status });
        return { status: "updated", sessions, persisted: res.status };
      }
      case "not_found":
        if (sessions === 0) return { status: "unknown_player" };
        return { status: "updated", sessions, persisted: "not_found" };
      case "unavailable":
        if (sessions === 0) return { status: "unavailable", error: loaded.error };
        return { status: "updated", sessions, persisted: "unavailable" };
    }
  }

  /**
   * Stop ticking, let sessions drain for up to the grace period, then
   * flush persistence. Returns the number of player writes lost.
   */
  async shutdown(): Promise<number> {
    if (this.stopping) return 0;
    this.stopping = true;

    log.info("Shutting down", { sessions: this.sessions.count() });

    this.ticks.stop();
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    this.sessions.closeAll("server_shutdown");
    const deadline = Date.now() + this.config.drainGraceMs;
    while (this.sessions.count() > 0 && Date.now() < deadline) {
      this.sessions.sweep();
      await new Promise<void>((resolve) => setTimeout(resolve, 25));
    }
    this.sessions.sweep(Number.POSITIVE_INFINITY);

    const lost = await this.gateway.shutdown();
    log.info("Shutdown complete", { lostWrites: lost });
    return lost;
  }

  private emitClosed(sessionId: SessionId, reason: CloseReason): void {
    for (const listener of this.closedListeners) {
      try {
        listener(sessionId, reason);
      } catch (err) {
        log.warn("Session closed listener failed", { sessionId, err });
      }
    }
  }
}
