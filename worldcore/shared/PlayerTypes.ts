// worldcore/shared/PlayerTypes.ts
//
// Pure types for durable player identity and rankings.
// No DB access here; stores live in worldcore/persistence.

export type PlayerId = string;

export interface ModerationFlags {
  /** Chat from this player is dropped server-side. */
  muted?: boolean;

  /** Count of messages that needed filtering. */
  chatStrikes?: number;
}

export interface PlayerRecord {
  playerId: PlayerId;
  displayName: string;

  /** Lifetime best; stores keep the max of what they have and what they get. */
  bestScore: number;

  moderation: ModerationFlags;

  /** ms since epoch */
  lastSeenAt: number;
}

export interface LeaderboardEntry {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly score: number;
  /** 1-based, derived on every publish, never stored. */
  readonly rank: number;
}

export type LeaderboardPeriod = "all" | "week" | "day";

export const LEADERBOARD_PERIODS: readonly LeaderboardPeriod[] = ["all", "week", "day"];

/** Lifetime of a stored period score in ms; null = never expires. */
export function periodTtlMs(period: LeaderboardPeriod): number | null {
  switch (period) {
    case "all":
      return null;
    case "week":
      return 7 * 24 * 60 * 60_000;
    case "day":
      return 24 * 60 * 60_000;
  }
}

export interface PeriodScore {
  period: LeaderboardPeriod;
  playerId: PlayerId;
  displayName: string;
  score: number;
  /** ms since epoch, null for all-time rows */
  expiresAt: number | null;
}

/**
 * Strikes only grow. `muted` is last-write-wins: an incoming flag replaces the
 * stored one when the incoming record is at least as recent; an incoming
 * record without the flag leaves it alone.
 */
export function mergeModeration(
  stored: ModerationFlags,
  incoming: ModerationFlags,
  incomingIsNewer = true,
): ModerationFlags {
  return {
    muted: incomingIsNewer && incoming.muted !== undefined ? incoming.muted : Boolean(stored.muted),
    chatStrikes: Math.max(stored.chatStrikes ?? 0, incoming.chatStrikes ?? 0),
  };
}

/**
 * Combine a stored record with an incoming one. Applying the same incoming
 * record twice yields the same result as applying it once.
 */
export function mergePlayerRecord(stored: PlayerRecord | undefined, incoming: PlayerRecord): PlayerRecord {
  if (!stored) {
    return {
      ...incoming,
      moderation: mergeModeration({}, incoming.moderation),
    };
  }

  return {
    playerId: stored.playerId,
    displayName: incoming.displayName || stored.displayName,
    bestScore: Math.max(stored.bestScore, incoming.bestScore),
    moderation: mergeModeration(stored.moderation, incoming.moderation, incoming.lastSeenAt >= stored.lastSeenAt),
    lastSeenAt: Math.max(stored.lastSeenAt, incoming.lastSeenAt),
  };
}
