// worldcore/sync/EntityDelta.ts
//
// Field-level diff between two entity sets, and the inverse (apply).
// diff() compares exactly; jitter suppression happens earlier, when
// WorldHistory canonicalizes a tick, so any two recorded states can be
// diffed and re-applied without loss.

import {
  CATEGORICAL_FIELDS,
  EntityId,
  EntityPatch,
  EntitySnapshot,
  NUMERIC_FIELDS,
} from "../shared/Entity";
import type { DeltaBody } from "../shared/messages";

export type EntityMap = ReadonlyMap<EntityId, EntitySnapshot>;

export function toEntityMap(entities: Iterable<EntitySnapshot>): Map<EntityId, EntitySnapshot> {
  const out = new Map<EntityId, EntitySnapshot>();
  for (const e of entities) out.set(e.id, e);
  return out;
}

/** Changed fields of `next` relative to `prev`, or null when identical. */
export function diffEntity(prev: EntitySnapshot, next: EntitySnapshot): EntityPatch | null {
  const patch: { -readonly [K in keyof EntitySnapshot]?: EntitySnapshot[K] } = {};
  let changed = false;

  for (const f of NUMERIC_FIELDS) {
    if (!Object.is(prev[f], next[f])) {
      patch[f] = next[f];
      changed = true;
    }
  }

  if (prev.type !== next.type) {
    patch.type = next.type;
    changed = true;
  }
  if (prev.owner !== next.owner) {
    patch.owner = next.owner;
    changed = true;
  }

  if (!changed) return null;
  return { ...patch, id: next.id };
}

export function diffEntities(
  baseline: EntityMap,
  current: EntityMap,
): Omit<DeltaBody, "baseline"> {
  const added: EntitySnapshot[] = [];
  const updated: EntityPatch[] = [];
  const removed: EntityId[] = [];

  for (const [id, e] of current) {
    const prev = baseline.get(id);
    if (!prev) {
      added.push(e);
      continue;
    }
    const patch = diffEntity(prev, e);
    if (patch) updated.push(patch);
  }

  for (const id of baseline.keys()) {
    if (!current.has(id)) removed.push(id);
  }

  // Ids ascending so identical inputs always produce identical frames
  added.sort((a, b) => a.id - b.id);
  updated.sort((a, b) => a.id - b.id);
  removed.sort((a, b) => a - b);

  return { added, updated, removed };
}

function patchEntity(prev: EntitySnapshot, patch: EntityPatch): EntitySnapshot {
  return {
    id: prev.id,
    type: patch.type ?? prev.type,
    x: patch.x ?? prev.x,
    y: patch.y ?? prev.y,
    vx: patch.vx ?? prev.vx,
    vy: patch.vy ?? prev.vy,
    direction: patch.direction ?? prev.direction,
    health: patch.health ?? prev.health,
    owner: patch.owner !== undefined ? patch.owner : prev.owner,
  };
}

/**
 * Apply a delta to the state at its baseline. Throws when the delta refers
 * to entities the state does not have: that means the caller used the wrong
 * baseline.
 */
export function applyDelta(
  state: EntityMap,
  delta: Pick<DeltaBody, "added" | "updated" | "removed">,
): Map<EntityId, EntitySnapshot> {
  const out = new Map(state);

  for (const id of delta.removed) {
    if (!out.delete(id)) {
      throw new Error(`applyDelta: removed entity ${id} not in baseline`);
    }
  }

  for (const patch of delta.updated) {
    const prev = out.get(patch.id);
    if (!prev) {
      throw new Error(`applyDelta: updated entity ${patch.id} not in baseline`);
    }
    out.set(patch.id, patchEntity(prev, patch));
  }

  for (const e of delta.added) {
    out.set(e.id, e);
  }

  return out;
}

export function entitiesEqual(a: EntitySnapshot, b: EntitySnapshot): boolean {
  if (a.id !== b.id) return false;
  for (const f of NUMERIC_FIELDS) {
    if (!Object.is(a[f], b[f])) return false;
  }
  for (const f of CATEGORICAL_FIELDS) {
    if (a[f] !== b[f]) return false;
  }
  return true;
}
