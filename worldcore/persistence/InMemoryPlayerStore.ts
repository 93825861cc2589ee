// worldcore/persistence/InMemoryPlayerStore.ts

import {
  LeaderboardPeriod,
  mergePlayerRecord,
  PeriodScore,
  PlayerId,
  PlayerRecord,
} from "../shared/PlayerTypes";
import type { PlayerStore } from "./PlayerStore";

function clone(r: PlayerRecord): PlayerRecord {
  return { ...r, moderation: { ...r.moderation } };
}

function live(row: PeriodScore, now: number): boolean {
  return row.expiresAt === null || row.expiresAt > now;
}

/** Process-local store for tests and `ARENA_STORE=memory` dev runs. */
export class InMemoryPlayerStore implements PlayerStore {
  readonly kind = "memory";

  private readonly players = new Map<PlayerId, PlayerRecord>();
  private readonly scores = new Map<string, PeriodScore>();

  async getPlayer(playerId: PlayerId): Promise<PlayerRecord | null> {
    const r = this.players.get(playerId);
    return r ? clone(r) : null;
  }

  async upsertPlayer(record: PlayerRecord): Promise<PlayerRecord> {
    const merged = mergePlayerRecord(this.players.get(record.playerId), record);
    this.players.set(record.playerId, merged);
    return clone(merged);
  }

  async upsertPeriodScore(row: PeriodScore, now: number): Promise<boolean> {
    const key = `${row.period}:${row.playerId}`;
    const prev = this.scores.get(key);
    if (prev && live(prev, now) && prev.score >= row.score) return false;
    this.scores.set(key, { ...row });
    return true;
  }

  async topScores(period: LeaderboardPeriod, limit: number, now: number): Promise<PeriodScore[]> {
    return Array.from(this.scores.values())
      .filter((r) => r.period === period && live(r, now))
      .sort((a, b) => b.score - a.score || (a.playerId < b.playerId ? -1 : a.playerId > b.playerId ? 1 : 0))
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
