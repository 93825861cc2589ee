// worldcore/leaderboard/LeaderboardService.ts

import type { LeaderboardEntry, PlayerId } from "../shared/PlayerTypes";
import { Logger } from "../utils/logger";

const log = Logger.scope("LEADERBOARD");

export interface Standing {
  playerId: PlayerId;
  displayName: string;
  score: number;
  /** When the player reached the current score (ms since epoch). */
  achievedAt: number;
}

interface PendingScore {
  playerId: PlayerId;
  displayName: string | null;
  score: number;
  at: number;
}

/**
 * Total order: higher score first, then whoever got there first, then
 * player id so equal scores at the same instant still sort the same way.
 */
export function compareStandings(a: Standing, b: Standing): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.achievedAt !== b.achievedAt) return a.achievedAt - b.achievedAt;
  return a.playerId < b.playerId ? -1 : a.playerId > b.playerId ? 1 : 0;
}

/**
 * Live ranking of connected players.
 *
 * recordScore() only queues; applyBatch() (once per tick) folds the queue
 * into the standings. The ranked snapshot is rebuilt lazily and handed out
 * frozen, so readers can keep it as long as they like.
 */
export class LeaderboardService {
  private pending: PendingScore[] = [];
  private readonly standings = new Map<PlayerId, Standing>();
  private ranked: readonly LeaderboardEntry[] | null = null;

  recordScore(playerId: PlayerId, score: number, displayName: string | null = null, at = Date.now()): void {
    if (!Number.isFinite(score)) {
      log.warn("Ignoring non-finite score", { playerId, score });
      return;
    }
    this.pending.push({ playerId, displayName, score, at });
  }

  /** Fold queued scores in. Returns how many standings changed. */
  applyBatch(): number {
    if (this.pending.length === 0) return 0;

    const batch = this.pending;
    this.pending = [];

    let changed = 0;
    for (const p of batch) {
      const prev = this.standings.get(p.playerId);
      if (!prev) {
        this.standings.set(p.playerId, {
          playerId: p.playerId,
          displayName: p.displayName ?? p.playerId,
          score: p.score,
          achievedAt: p.at,
        });
        changed++;
        continue;
      }

      const name = p.displayName ?? prev.displayName;
      if (prev.score === p.score && prev.displayName === name) continue;

      this.standings.set(p.playerId, {
        playerId: p.playerId,
        displayName: name,
        score: p.score,
        achievedAt: prev.score === p.score ? prev.achievedAt : p.at,
      });
      changed++;
    }

    if (changed > 0) this.ranked = null;
    return changed;
  }

  /** Drop a player (session closed). Takes effect immediately. */
  remove(playerId: PlayerId): boolean {
    this.pending = this.pending.filter((p) => p.playerId !== playerId);
    const had = this.standings.delete(playerId);
    if (had) this.ranked = null;
    return had;
  }

  standingOf(playerId: PlayerId): Standing | undefined {
    return this.standings.get(playerId);
  }

  get size(): number {
    return this.standings.size;
  }

  snapshot(): readonly LeaderboardEntry[] {
    if (!this.ranked) {
      const sorted = Array.from(this.standings.values()).sort(compareStandings);
      this.ranked = Object.freeze(
        sorted.map((s, i) =>
          Object.freeze({ playerId: s.playerId, displayName: s.displayName, score: s.score, rank: i + 1 }),
        ),
      );
    }
    return this.ranked;
  }

  top(n: number): readonly LeaderboardEntry[] {
    const all = this.snapshot();
    return all.length <= n ? all : all.slice(0, n);
  }
}
