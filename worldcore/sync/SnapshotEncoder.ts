// worldcore/sync/SnapshotEncoder.ts

import type { EntityId, EntitySnapshot, Region, WorldTick } from "../shared/Entity";
import { regionContains } from "../shared/Entity";
import { EncodingFault } from "../shared/errors";
import { FrameKind, WorldFrame } from "../shared/messages";
import type { SessionId, SessionView } from "../shared/Session";
import { Logger } from "../utils/logger";
import { diffEntities, EntityMap } from "./EntityDelta";
import { WorldHistory } from "./WorldHistory";

const log = Logger.scope("ENCODER");

export interface SnapshotEncoderConfig {
  historyTicks: number;
  recencyWindowTicks: number;
  epsilon: number;
}

export type AckResult = "accepted" | "stale" | "unknown_tick";

interface SessionBaseline {
  ackTick: WorldTick | null;
  /** Acks for ticks before this are from before the last full resync. */
  resetAtTick: WorldTick;
  region: Region | null;
  sentTicks: Set<WorldTick>;
  lastSentTick: WorldTick | null;
}

export interface EncoderStats {
  fullFrames: number;
  deltaFrames: number;
  faults: number;
}

function sameRegion(a: Region | null, b: Region | null): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return a.minX === b.minX && a.minY === b.minY && a.maxX === b.maxX && a.maxY === b.maxY;
}

function visible(state: EntityMap, region: Region | null): EntityMap {
  if (!region) return state;
  const out = new Map<EntityId, EntitySnapshot>();
  for (const [id, e] of state) {
    if (regionContains(region, e)) out.set(id, e);
  }
  return out;
}

/**
 * Builds per-session world frames: a delta against the session's last
 * acknowledged tick when that state is still retained and recent enough,
 * otherwise a full snapshot (which also resets the session's baseline).
 */
export class SnapshotEncoder {
  private readonly history: WorldHistory;
  private readonly baselines = new Map<SessionId, SessionBaseline>();
  private readonly stats: EncoderStats = { fullFrames: 0, deltaFrames: 0, faults: 0 };

  constructor(private readonly cfg: SnapshotEncoderConfig) {
    this.history = new WorldHistory(cfg.historyTicks, cfg.epsilon);
  }

  encode(session: SessionView, currentTick: WorldTick, currentEntities: Iterable<EntitySnapshot>): WorldFrame {
    const current = this.history.record(currentTick, currentEntities);
    const b = this.baselineFor(session.id, currentTick);

    if (!sameRegion(b.region, session.region)) {
      // The client's view at the old ack was cut with the old region.
      this.reset(b, currentTick);
      b.region = session.region;
    }

    const view = visible(current, b.region);
    const frame = this.tryDelta(session.id, b, currentTick, view) ?? this.full(b, currentTick, view);

    b.sentTicks.add(currentTick);
    b.lastSentTick = currentTick;
    this.pruneSent(b);

    return frame;
  }

  /**
   * Record that the client holds the state it was sent for `tick`.
   * Acks only move forward, and only for ticks actually sent since the last
   * resync.
   */
  acknowledge(sessionId: SessionId, tick: WorldTick): AckResult {
    const b = this.baselines.get(sessionId);
    if (!b || b.lastSentTick === null || tick > b.lastSentTick) return "unknown_tick";

    if (tick < b.resetAtTick) return "stale";
    if (b.ackTick !== null && tick <= b.ackTick) return "stale";

    if (!b.sentTicks.has(tick)) {
      // Older than what we still track counts as stale; inside the tracked
      // range it is a tick this session was never sent.
      return this.history.isRetained(tick) ? "unknown_tick" : "stale";
    }

    b.ackTick = tick;
    return "accepted";
  }

  /** Force the next frame for this session to be a full snapshot. */
  resetBaseline(sessionId: SessionId): void {
    const b = this.baselines.get(sessionId);
    if (!b) return;
    this.reset(b, (b.lastSentTick ?? 0) + 1);
  }

  ackTickOf(sessionId: SessionId): WorldTick | null {
    return this.baselines.get(sessionId)?.ackTick ?? null;
  }

  forget(sessionId: SessionId): void {
    this.baselines.delete(sessionId);
  }

  /** Canonical recorded state for a tick (what every frame is built from). */
  recordedState(tick: WorldTick): EntityMap | undefined {
    return this.history.get(tick);
  }

  getStats(): Readonly<EncoderStats> {
    return { ...this.stats };
  }

  // ---------------------------------------------------------------------------

  private tryDelta(
    sessionId: SessionId,
    b: SessionBaseline,
    tick: WorldTick,
    view: EntityMap,
  ): WorldFrame | null {
    const ack = b.ackTick;
    if (ack === null) return null;

    if (tick - ack > this.cfg.recencyWindowTicks) {
      log.debug("Baseline too old, sending full snapshot", { sessionId, ack, tick });
      return null;
    }

    const baseState = this.history.get(ack);
    if (!baseState) {
      const fault = new EncodingFault("baseline no longer retained", sessionId, ack);
      this.stats.faults++;
      log.debug("Encoding fault, forcing full snapshot", { sessionId, tick, err: fault });
      return null;
    }

    this.stats.deltaFrames++;
    return {
      tick,
      kind: FrameKind.Delta,
      body: { baseline: ack, ...diffEntities(visible(baseState, b.region), view) },
    };
  }

  private full(b: SessionBaseline, tick: WorldTick, view: EntityMap): WorldFrame {
    this.reset(b, tick);
    this.stats.fullFrames++;

    const entities = Array.from(view.values()).sort((x, y) => x.id - y.id);
    return { tick, kind: FrameKind.Full, body: { entities } };
  }

  private reset(b: SessionBaseline, fromTick: WorldTick): void {
    b.ackTick = null;
    b.resetAtTick = fromTick;
    b.sentTicks.clear();
  }

  private baselineFor(sessionId: SessionId, tick: WorldTick): SessionBaseline {
    let b = this.baselines.get(sessionId);
    if (!b) {
      b = { ackTick: null, resetAtTick: tick, region: null, sentTicks: new Set(), lastSentTick: null };
      this.baselines.set(sessionId, b);
    }
    return b;
  }

  private pruneSent(b: SessionBaseline): void {
    if (b.sentTicks.size <= this.history.horizon) return;
    for (const t of b.sentTicks) {
      if (!this.history.isRetained(t)) b.sentTicks.delete(t);
    }
  }
}
