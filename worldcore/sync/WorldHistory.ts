// worldcore/sync/WorldHistory.ts

import type { EntityId, EntitySnapshot, WorldTick } from "../shared/Entity";
import { NUMERIC_FIELDS } from "../shared/Entity";
import type { EntityMap } from "./EntityDelta";

interface HistorySlot {
  tick: WorldTick;
  entities: EntityMap;
}

/**
 * Ring buffer of recent canonical world states, one per tick.
 *
 * "Canonical" means simulation jitter has been folded away: a numeric field
 * only takes its new value once it has moved at least `epsilon` away from
 * the last recorded value. Every frame is built from these recorded states,
 * never from raw simulation output, so a delta between any two retained
 * ticks reconstructs the later one exactly.
 *
 * Only ticks strictly newer than `latest - capacity` are retained.
 */
export class WorldHistory {
  private readonly slots: Array<HistorySlot | undefined>;
  private latestTick: WorldTick | null = null;
  private latest: EntityMap = new Map();

  constructor(
    private readonly capacity: number,
    private readonly epsilon: number,
  ) {
    if (capacity < 1) throw new Error("WorldHistory capacity must be >= 1");
    this.slots = new Array<HistorySlot | undefined>(capacity);
  }

  get horizon(): number {
    return this.capacity;
  }

  latestTickNumber(): WorldTick | null {
    return this.latestTick;
  }

  /**
   * Record the simulation output for `tick` and return its canonical state.
   * Recording the latest tick again returns the stored state unchanged, so
   * every session encoded in one tick sees the same world.
   */
  record(tick: WorldTick, entities: Iterable<EntitySnapshot>): EntityMap {
    if (this.latestTick !== null) {
      if (tick === this.latestTick) return this.latest;
      if (tick < this.latestTick) {
        throw new Error(`WorldHistory: tick ${tick} is older than latest ${this.latestTick}`);
      }
    }

    const canonical = new Map<EntityId, EntitySnapshot>();
    for (const e of entities) {
      const prev = this.latest.get(e.id);
      canonical.set(e.id, prev ? this.fold(prev, e) : Object.freeze({ ...e }));
    }

    this.latestTick = tick;
    this.latest = canonical;
    this.slots[tick % this.capacity] = { tick, entities: canonical };

    return canonical;
  }

  /** Canonical state at `tick`, or undefined once it left the horizon. */
  get(tick: WorldTick): EntityMap | undefined {
    if (!this.isRetained(tick)) return undefined;
    const slot = this.slots[tick % this.capacity];
    return slot && slot.tick === tick ? slot.entities : undefined;
  }

  isRetained(tick: WorldTick): boolean {
    if (this.latestTick === null) return false;
    return tick <= this.latestTick && tick > this.latestTick - this.capacity;
  }

  private fold(prev: EntitySnapshot, next: EntitySnapshot): EntitySnapshot {
    let changed = prev.type !== next.type || prev.owner !== next.owner;

    const folded: Record<(typeof NUMERIC_FIELDS)[number], number> = {
      x: prev.x,
      y: prev.y,
      vx: prev.vx,
      vy: prev.vy,
      direction: prev.direction,
      health: prev.health,
    };

    for (const f of NUMERIC_FIELDS) {
      const a = prev[f];
      const b = next[f];
      if (Object.is(a, b)) continue;
      // NaN never compares below epsilon, so it always propagates
      if (Math.abs(b - a) < this.epsilon) continue;
      folded[f] = b;
      changed = true;
    }

    if (!changed) return prev;

    return Object.freeze({
      id: next.id,
      type: next.type,
      owner: next.owner,
      ...folded,
    });
  }
}
