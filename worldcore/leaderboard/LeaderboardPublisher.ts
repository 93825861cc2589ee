// worldcore/leaderboard/LeaderboardPublisher.ts

import type { WorldTick } from "../shared/Entity";
import type { LeaderboardBody } from "../shared/messages";
import type { LeaderboardEntry, PlayerId } from "../shared/PlayerTypes";
import { Logger } from "../utils/logger";
import type { LeaderboardService } from "./LeaderboardService";

const log = Logger.scope("LEADERBOARD");

export interface LeaderboardSink {
  broadcastLeaderboard(body: LeaderboardBody): number;
}

export interface LeaderboardPublisherConfig {
  everyTicks: number;
  size: number;
}

/** Called with each newly published top list; used to feed period scores. */
export type PublishedListener = (entries: readonly LeaderboardEntry[]) => void;

function sameEntry(a: LeaderboardEntry, b: LeaderboardEntry): boolean {
  return a.rank === b.rank && a.score === b.score && a.displayName === b.displayName;
}

/**
 * Sends top-N leaderboard deltas on its own cadence, decoupled from the
 * world frame rate.
 */
export class LeaderboardPublisher {
  private published: readonly LeaderboardEntry[] = [];
  private publishCount = 0;

  constructor(
    private readonly service: LeaderboardService,
    private readonly sink: LeaderboardSink,
    private readonly cfg: LeaderboardPublisherConfig,
    private readonly onPublished?: PublishedListener,
  ) {}

  /** Publishes on every `everyTicks`-th tick; returns what went out, if anything. */
  onTick(tick: WorldTick): LeaderboardBody | null {
    if (this.cfg.everyTicks <= 0 || tick % this.cfg.everyTicks !== 0) return null;
    return this.publish();
  }

  publish(): LeaderboardBody | null {
    const next = this.service.top(this.cfg.size);
    const body = diffTopList(this.published, next);
    if (!body) return null;

    this.published = next;
    this.publishCount++;

    const sent = this.sink.broadcastLeaderboard(body);
    log.debug("Leaderboard published", {
      upserts: body.upserts.length,
      removed: body.removed.length,
      sessions: sent,
    });

    if (this.onPublished) {
      try {
        this.onPublished(next);
      } catch (err) {
        log.warn("Leaderboard publish listener failed", { err });
      }
    }

    return body;
  }

  /** Everything currently published, for a session that just joined. */
  fullBody(): LeaderboardBody {
    return { upserts: [...this.published], removed: [], size: this.published.length };
  }

  current(): readonly LeaderboardEntry[] {
    return this.published;
  }

  get publishes(): number {
    return this.publishCount;
  }
}

/** Delta between two published lists; null when nothing changed. */
export function diffTopList(
  prev: readonly LeaderboardEntry[],
  next: readonly LeaderboardEntry[],
): LeaderboardBody | null {
  const before = new Map<PlayerId, LeaderboardEntry>();
  for (const e of prev) before.set(e.playerId, e);

  const upserts: LeaderboardEntry[] = [];
  const kept = new Set<PlayerId>();
  for (const e of next) {
    kept.add(e.playerId);
    const old = before.get(e.playerId);
    if (!old || !sameEntry(old, e)) upserts.push(e);
  }

  const removed: PlayerId[] = [];
  for (const e of prev) {
    if (!kept.has(e.playerId)) removed.push(e.playerId);
  }

  if (upserts.length === 0 && removed.length === 0) return null;
  return { upserts, removed, size: next.length };
}
