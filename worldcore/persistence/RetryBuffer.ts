// worldcore/persistence/RetryBuffer.ts

import { mergePlayerRecord, PlayerId, PlayerRecord } from "../shared/PlayerTypes";

export interface PendingWrite {
  record: PlayerRecord;
  /** Critical writes (final score on disconnect) are never dropped. */
  critical: boolean;
  attempts: number;
  nextAttemptAt: number;
}

export type RetryAddOutcome =
  | { status: "queued" }
  | { status: "merged" }
  | { status: "queued_after_drop"; dropped: PlayerId }
  | { status: "dropped_incoming" };

export interface RetryBufferConfig {
  capacity: number;
  baseMs: number;
  maxMs: number;
}

/** Delay before attempt number `attempts + 1`: base * 2^(attempts-1), capped. */
export function backoffDelay(attempts: number, baseMs: number, maxMs: number): number {
  const exp = Math.max(0, attempts - 1);
  return Math.min(maxMs, baseMs * 2 ** Math.min(exp, 30));
}

/**
 * Bounded buffer of player writes that failed and wait for another try.
 * One entry per player: a newer write for a player already waiting is
 * merged into it (records merge monotonically, so nothing is lost).
 *
 * When full, the oldest non-critical entry makes room. Critical entries
 * are kept even past capacity.
 */
export class RetryBuffer {
  // Map iteration order doubles as age order (oldest first).
  private readonly entries = new Map<PlayerId, PendingWrite>();
  private droppedCount = 0;

  constructor(private readonly cfg: RetryBufferConfig) {}

  add(record: PlayerRecord, critical: boolean, now: number, attempts = 1): RetryAddOutcome {
    const existing = this.entries.get(record.playerId);
    if (existing) {
      existing.record = mergePlayerRecord(existing.record, record);
      existing.critical = existing.critical || critical;
      return { status: "merged" };
    }

    const entry: PendingWrite = {
      record,
      critical,
      attempts,
      nextAttemptAt: now + backoffDelay(attempts, this.cfg.baseMs, this.cfg.maxMs),
    };

    if (this.entries.size < this.cfg.capacity) {
      this.entries.set(record.playerId, entry);
      return { status: "queued" };
    }

    for (const [key, e] of this.entries) {
      if (!e.critical) {
        this.entries.delete(key);
        this.entries.set(record.playerId, entry);
        this.droppedCount++;
        return { status: "queued_after_drop", dropped: key };
      }
    }

    if (!critical) {
      this.droppedCount++;
      return { status: "dropped_incoming" };
    }

    this.entries.set(record.playerId, entry);
    return { status: "queued" };
  }

  /** Entries whose backoff has elapsed, oldest first. */
  due(now: number): PendingWrite[] {
    const out: PendingWrite[] = [];
    for (const e of this.entries.values()) {
      if (e.nextAttemptAt <= now) out.push(e);
    }
    return out;
  }

  all(): PendingWrite[] {
    return Array.from(this.entries.values());
  }

  /** Another attempt failed; push the next one out. */
  reschedule(playerId: PlayerId, now: number): void {
    const e = this.entries.get(playerId);
    if (!e) return;
    e.attempts++;
    e.nextAttemptAt = now + backoffDelay(e.attempts, this.cfg.baseMs, this.cfg.maxMs);
  }

  /**
   * Remove after a successful write, unless the entry picked up newer data
   * while the write was in flight.
   */
  settle(playerId: PlayerId, written: PlayerRecord): void {
    const e = this.entries.get(playerId);
    if (!e) return;
    const merged = mergePlayerRecord(written, e.record);
    if (
      merged.bestScore === written.bestScore &&
      merged.lastSeenAt === written.lastSeenAt &&
      Boolean(merged.moderation.muted) === Boolean(written.moderation.muted) &&
      (merged.moderation.chatStrikes ?? 0) === (written.moderation.chatStrikes ?? 0)
    ) {
      this.entries.delete(playerId);
    }
  }

  cancelNonCritical(playerId: PlayerId): boolean {
    const e = this.entries.get(playerId);
    if (!e || e.critical) return false;
    this.entries.delete(playerId);
    return true;
  }

  /** Shutdown: give up on everything still waiting. */
  clear(): number {
    const n = this.entries.size;
    this.entries.clear();
    return n;
  }

  get size(): number {
    return this.entries.size;
  }

  get criticalCount(): number {
    let n = 0;
    for (const e of this.entries.values()) if (e.critical) n++;
    return n;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
