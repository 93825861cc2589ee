// worldcore/persistence/PersistenceGateway.ts

import { describeError } from "../shared/errors";
import {
  LEADERBOARD_PERIODS,
  LeaderboardEntry,
  LeaderboardPeriod,
  PeriodScore,
  PlayerId,
  PlayerRecord,
  periodTtlMs,
} from "../shared/PlayerTypes";
import { Logger } from "../utils/logger";
import type { PlayerStore } from "./PlayerStore";
import { RetryBuffer } from "./RetryBuffer";

const log = Logger.scope("PERSIST");

const DEFAULT_PERIOD_TOP_SIZE = 15;

export type LoadPlayerResult =
  | { status: "found"; record: PlayerRecord }
  | { status: "not_found" }
  | { status: "unavailable"; error: string };

export type UpsertResult =
  | { status: "stored"; record: PlayerRecord }
  | { status: "queued"; attempts: number }
  | { status: "dropped" };

export type ReadLeaderboardResult =
  | { status: "ok"; entries: PeriodScore[] }
  | { status: "unavailable"; error: string };

export interface PersistenceGatewayConfig {
  retryBaseMs: number;
  retryMaxMs: number;
  retryBufferCapacity: number;
  /** Rows kept per period table; only scores that would rank are written. */
  periodLeaderboardSize?: number;
}

export interface UpsertOptions {
  /** Final score on disconnect: retried until success or shutdown. */
  critical?: boolean;
  now?: number;
}

export interface PersistenceStats {
  storeKind: string;
  available: boolean;
  pendingWrites: number;
  pendingCritical: number;
  droppedWrites: number;
  inFlight: number;
}

/**
 * Everything durable goes through here. Callers get result objects, never
 * throws; failed player writes are parked in a RetryBuffer and retried with
 * exponential backoff from processRetries().
 */
export class PersistenceGateway {
  private readonly retries: RetryBuffer;
  private readonly inFlight = new Set<Promise<unknown>>();
  private available = true;
  private retryPass: Promise<number> | null = null;
  private closed = false;
  private retryHandle: NodeJS.Timeout | null = null;
  private readonly periodTopSize: number;
  private readonly periodTop = new Map<LeaderboardPeriod, PeriodScore[]>();

  constructor(
    private readonly store: PlayerStore,
    cfg: PersistenceGatewayConfig,
  ) {
    this.retries = new RetryBuffer({
      capacity: cfg.retryBufferCapacity,
      baseMs: cfg.retryBaseMs,
      maxMs: cfg.retryMaxMs,
    });
    this.periodTopSize = Math.max(1, cfg.periodLeaderboardSize ?? DEFAULT_PERIOD_TOP_SIZE);
  }

  // ---------------------------------------------------------------------------
  // Players
  // ---------------------------------------------------------------------------

  async loadPlayer(playerId: PlayerId): Promise<LoadPlayerResult> {
    try {
      const record = await this.store.getPlayer(playerId);
      this.available = true;
      return record ? { status: "found", record } : { status: "not_found" };
    } catch (err) {
      this.available = false;
      log.warn("loadPlayer failed", { playerId, err });
      return { status: "unavailable", error: describeError(err) };
    }
  }

  async upsertPlayer(record: PlayerRecord, opts: UpsertOptions = {}): Promise<UpsertResult> {
    const critical = opts.critical ?? false;

    try {
      const stored = await this.store.upsertPlayer(record);
      this.available = true;
      // Anything parked for this player is now covered (or still newer).
      this.retries.settle(record.playerId, stored);
      return { status: "stored", record: stored };
    } catch (err) {
      this.available = false;
      if (this.closed) {
        log.warn("Write failed after shutdown; not retried", { playerId: record.playerId, critical, err });
        return { status: "dropped" };
      }

      const outcome = this.retries.add(record, critical, opts.now ?? Date.now());
      switch (outcome.status) {
        case "dropped_incoming":
          log.warn("Retry buffer full, write dropped", { playerId: record.playerId });
          return { status: "dropped" };
        case "queued_after_drop":
          log.warn("Retry buffer full, dropped oldest write", { dropped: outcome.dropped });
          break;
        default:
          break;
      }

      log.debug("Write parked for retry", { playerId: record.playerId, critical, err });
      return { status: "queued", attempts: 1 };
    }
  }

  /**
   * Fire-and-forget final write for a closing session. Not tied to the
   * session: it keeps retrying after the session is gone.
   */
  persistFinal(record: PlayerRecord): void {
    this.track(
      this.upsertPlayer(record, { critical: true }).then((res) => {
        log.debug("Final score write", { playerId: record.playerId, status: res.status });
      }),
    );
  }

  /** Session closed: its non-critical retries no longer matter. */
  cancelNonCritical(playerId: PlayerId): boolean {
    return this.retries.cancelNonCritical(playerId);
  }

  /**
   * Retry everything whose backoff has elapsed. Returns how many were written.
   * A call made while a pass is running returns 0 without waiting for it.
   */
  processRetries(now = Date.now()): Promise<number> {
    if (this.retryPass) return Promise.resolve(0);
    const pass = this.runRetries(now).finally(() => {
      this.retryPass = null;
    });
    this.retryPass = pass;
    return pass;
  }

  private async runRetries(now: number): Promise<number> {
    let written = 0;
    for (const pending of this.retries.due(now)) {
      try {
        const stored = await this.store.upsertPlayer(pending.record);
        this.available = true;
        this.retries.settle(pending.record.playerId, stored);
        written++;
      } catch (err) {
        this.available = false;
        this.retries.reschedule(pending.record.playerId, now);
        log.debug("Retry failed", { playerId: pending.record.playerId, attempts: pending.attempts, err });
      }
    }

    if (written > 0) log.info("Retried writes stored", { written, pending: this.retries.size });
    return written;
  }

  startRetryLoop(intervalMs: number): void {
    if (this.retryHandle) return;
    this.retryHandle = setInterval(() => {
      this.processRetries().catch((err) => log.error("Retry loop failed", { err }));
    }, Math.max(intervalMs, 10));
    this.retryHandle.unref?.();
  }

  stopRetryLoop(): void {
    if (this.retryHandle) {
      clearInterval(this.retryHandle);
      this.retryHandle = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Period leaderboards
  // ---------------------------------------------------------------------------

  /**
   * Feed a published top list into every period table. Best effort.
   *
   * Only scores of at least 1 that would place in a period's top
   * `periodLeaderboardSize` (as seen by this process) are written; a player's
   * row is rewritten only when their score beats it.
   */
  recordPeriodScores(entries: readonly LeaderboardEntry[], now = Date.now()): void {
    if (entries.length === 0 || this.closed) return;

    const rows: PeriodScore[] = [];
    for (const period of LEADERBOARD_PERIODS) {
      const ttl = periodTtlMs(period);
      const top = (this.periodTop.get(period) ?? []).filter((r) => r.expiresAt === null || r.expiresAt > now);

      for (const e of entries) {
        if (!this.ranksInPeriod(top, e)) continue;
        const row: PeriodScore = {
          period,
          playerId: e.playerId,
          displayName: e.displayName,
          score: e.score,
          expiresAt: ttl === null ? null : now + ttl,
        };
        rows.push(row);

        const own = top.findIndex((r) => r.playerId === e.playerId);
        if (own >= 0) top.splice(own, 1);
        top.push(row);
        top.sort((a, b) => b.score - a.score || (a.playerId < b.playerId ? -1 : a.playerId > b.playerId ? 1 : 0));
        top.length = Math.min(top.length, this.periodTopSize);
      }
      this.periodTop.set(period, top);
    }
    if (rows.length === 0) return;

    this.track(
      Promise.all(rows.map((r) => this.store.upsertPeriodScore(r, now)))
        .then((written) => {
          this.available = true;
          const n = written.filter(Boolean).length;
          if (n > 0) log.debug("Period scores updated", { rows: n });
        })
        .catch((err) => {
          this.available = false;
          // Forget what was admitted so the next publish tries again.
          this.periodTop.clear();
          log.warn("Period score write failed", { err });
        }),
    );
  }

  private ranksInPeriod(top: readonly PeriodScore[], e: LeaderboardEntry): boolean {
    if (e.score < 1) return false;
    const own = top.find((r) => r.playerId === e.playerId);
    if (own) return e.score > own.score;
    const lowest = top[this.periodTopSize - 1];
    return lowest === undefined || e.score > lowest.score;
  }

  async readLeaderboard(period: LeaderboardPeriod, limit: number, now = Date.now()): Promise<ReadLeaderboardResult> {
    try {
      const entries = await this.store.topScores(period, limit, now);
      this.available = true;
      return { status: "ok", entries };
    } catch (err) {
      this.available = false;
      return { status: "unavailable", error: describeError(err) };
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  stats(): PersistenceStats {
    return {
      storeKind: this.store.kind,
      available: this.available,
      pendingWrites: this.retries.size,
      pendingCritical: this.retries.criticalCount,
      droppedWrites: this.retries.dropped,
      inFlight: this.inFlight.size,
    };
  }

  /** Resolves once every detached write started so far has settled. */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  /**
   * Stop retrying, wait for in-flight writes, give every parked write one
   * final attempt regardless of backoff, then close the store.
   * Returns how many writes were lost.
   */
  async shutdown(): Promise<number> {
    this.stopRetryLoop();
    await this.settled();

    // A pass started by the loop only covers what was due when it began.
    let running = this.retryPass;
    while (running) {
      await running;
      running = this.retryPass;
    }
    await this.processRetries(Number.POSITIVE_INFINITY);
    this.closed = true;

    const lost = this.retries.clear();
    if (lost > 0) log.warn("Shutdown with unwritten player records", { lost });

    try {
      await this.store.close();
    } catch (err) {
      log.warn("Store close failed", { err });
    }
    return lost;
  }

  private track(p: Promise<unknown>): void {
    const guarded = p.catch((err) => log.error("Detached persistence task failed", { err }));
    this.inFlight.add(guarded);
    void guarded.finally(() => this.inFlight.delete(guarded));
  }
}
