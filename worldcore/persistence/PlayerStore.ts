// worldcore/persistence/PlayerStore.ts

import type { LeaderboardPeriod, PeriodScore, PlayerId, PlayerRecord } from "../shared/PlayerTypes";

/**
 * Durable key/value backend behind the PersistenceGateway.
 *
 * Implementations throw StorageUnavailable (or anything else) when the
 * backend cannot be reached; the gateway owns retrying.
 */
export interface PlayerStore {
  readonly kind: string;

  getPlayer(playerId: PlayerId): Promise<PlayerRecord | null>;

  /**
   * Merge `record` into what is stored (lifetime-best score, growing strike
   * count, mute flag from the most recent record, newest last-seen) and
   * return the stored result. Idempotent.
   */
  upsertPlayer(record: PlayerRecord): Promise<PlayerRecord>;

  /** Writes only when higher than the stored, unexpired score. Returns whether it wrote. */
  upsertPeriodScore(row: PeriodScore, now: number): Promise<boolean>;

  topScores(period: LeaderboardPeriod, limit: number, now: number): Promise<PeriodScore[]>;

  close(): Promise<void>;
}
