// worldcore/core/TickEngine.ts

import type { LeaderboardPublisher } from "../leaderboard/LeaderboardPublisher";
import type { LeaderboardService } from "../leaderboard/LeaderboardService";
import type { EntitySnapshot, WorldTick } from "../shared/Entity";
import type { Simulation } from "../sim/Simulation";
import { Logger } from "../utils/logger";
import type { Broadcaster } from "./Broadcaster";
import type { SessionManager } from "./SessionManager";

export interface TickEngineConfig {
  intervalMs: number; // tick interval (e.g. 50ms for 20 TPS)

  /**
   * Optional hook invoked once per tick after the broadcast with:
   *  - nowMs: Date.now() for this tick
   *  - tick: current tick number (starting at 1)
   *  - deltaMs: elapsed time since previous tick (ms)
   */
  onTick?: (nowMs: number, tick: WorldTick, deltaMs: number) => void;
}

export interface TickStats {
  tick: WorldTick;
  lastDurationMs: number;
  maxDurationMs: number;
  overruns: number;
}

/**
 * Single writer of world state. Each tick, synchronously:
 *   simulation step -> score updates -> leaderboard batch -> publish
 *   -> leaderboard cadence
 * Nothing here awaits; persistence and socket writes happen elsewhere.
 */
export class TickEngine {
  private readonly log = Logger.scope("TICK");
  private readonly intervalMs: number;

  private running = false;
  private handle: NodeJS.Timeout | null = null;
  private tickCount: WorldTick = 0;
  private lastTickAt: number | null = null;

  private lastDurationMs = 0;
  private maxDurationMs = 0;
  private overruns = 0;

  constructor(
    private readonly sim: Simulation,
    private readonly sessions: SessionManager,
    private readonly leaderboard: LeaderboardService,
    private readonly broadcaster: Broadcaster,
    private readonly publisher: LeaderboardPublisher,
    private readonly cfg: TickEngineConfig,
  ) {
    this.intervalMs = Math.max(cfg.intervalMs, 5);
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.lastTickAt = Date.now();

    this.log.info("Starting TickEngine", {
      intervalMs: this.intervalMs,
    });

    this.handle = setInterval(() => this.tick(), this.intervalMs);
    this.handle.unref?.();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
    }

    this.log.info("TickEngine stopped", {
      lastTick: this.tickCount,
    });
  }

  get currentTick(): WorldTick {
    return this.tickCount;
  }

  isRunning(): boolean {
    return this.running;
  }

  stats(): TickStats {
    return {
      tick: this.tickCount,
      lastDurationMs: this.lastDurationMs,
      maxDurationMs: this.maxDurationMs,
      overruns: this.overruns,
    };
  }

  /** Run one tick now. The interval timer calls this; tests call it directly. */
  tick(now = Date.now()): WorldTick {
    this.tickCount++;
    const tick = this.tickCount;

    const deltaMs = this.lastTickAt !== null ? now - this.lastTickAt : this.intervalMs;
    this.lastTickAt = now;
    const started = performance.now();

    let entities: readonly EntitySnapshot[] | null = null;
    try {
      entities = this.sim.step(tick, deltaMs);
    } catch (err) {
      // No world frame this tick; sessions catch up on the next one.
      this.log.warn("Simulation step failed", { tick, err });
    }

    try {
      for (const s of this.sim.drainScores()) {
        this.sessions.updateScore(s.sessionId, s.score, now);
      }
    } catch (err) {
      this.log.warn("Score drain failed", { tick, err });
    }

    this.leaderboard.applyBatch();

    if (entities) this.broadcaster.publish(tick, entities, now);

    this.publisher.onTick(tick);

    try {
      this.cfg.onTick?.(now, tick, deltaMs);
    } catch (err) {
      this.log.warn("Error in TickEngine onTick hook", { tick, err });
    }

    this.lastDurationMs = performance.now() - started;
    this.maxDurationMs = Math.max(this.maxDurationMs, this.lastDurationMs);
    if (this.lastDurationMs > this.intervalMs) this.overruns++;

    if (tick % 200 === 0) {
      this.log.debug("Tick summary", {
        tick,
        sessions: this.sessions.count(),
        entities: entities?.length ?? 0,
        lastDurationMs: Math.round(this.lastDurationMs * 100) / 100,
        deltaMs,
      });
    }

    return tick;
  }
}
