// worldcore/test/entityDelta.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import type { EntityId, EntitySnapshot } from "../shared/Entity";
import { applyDelta, diffEntities, diffEntity, entitiesEqual, toEntityMap } from "../sync/EntityDelta";
import { Rng } from "../utils/Rng";

function ent(id: EntityId, over: Partial<Omit<EntitySnapshot, "id">> = {}): EntitySnapshot {
  return { id, type: "ship", x: 0, y: 0, vx: 0, vy: 0, direction: 0, health: 100, owner: null, ...over };
}

test("diffEntity returns null for identical entities", () => {
  assert.equal(diffEntity(ent(1), ent(1)), null);
});

test("diffEntity lists only the fields that changed", () => {
  assert.deepEqual(diffEntity(ent(1), ent(1, { x: 5, health: 90 })), { id: 1, x: 5, health: 90 });
  assert.deepEqual(diffEntity(ent(1), ent(1, { owner: "p1" })), { id: 1, owner: "p1" });
  assert.deepEqual(diffEntity(ent(1, { owner: "p1" }), ent(1)), { id: 1, owner: null });
});

test("diffEntities splits added, updated and removed, ids ascending", () => {
  const base = toEntityMap([ent(3), ent(1), ent(2)]);
  const next = toEntityMap([ent(5), ent(2, { y: 7 }), ent(1), ent(4)]);

  const d = diffEntities(base, next);
  assert.deepEqual(d.added.map((e) => e.id), [4, 5]);
  assert.deepEqual(d.updated, [{ id: 2, y: 7 }]);
  assert.deepEqual(d.removed, [3]);
});

test("applyDelta refuses a delta built against another baseline", () => {
  const state = toEntityMap([ent(1)]);
  assert.throws(() => applyDelta(state, { added: [], updated: [{ id: 9, x: 1 }], removed: [] }), /not in baseline/);
  assert.throws(() => applyDelta(state, { added: [], updated: [], removed: [9] }), /not in baseline/);
});

function randomWorld(rng: Rng, maxId: number): EntitySnapshot[] {
  const out: EntitySnapshot[] = [];
  for (let id = 1; id <= maxId; id++) {
    if (!rng.chance(0.7)) continue;
    out.push(
      ent(id, {
        type: rng.pick(["ship", "rock", "pickup"]),
        x: rng.int(-50, 50),
        y: rng.range(-50, 50),
        vx: rng.chance(0.5) ? 0 : rng.range(-5, 5),
        health: rng.int(0, 3) * 25,
        owner: rng.pick([null, "p1", "p2"]),
      }),
    );
  }
  return out;
}

test("applying diff(a, b) to a always reconstructs b (seeded)", () => {
  const rng = new Rng("entity-delta");

  for (let round = 0; round < 200; round++) {
    const a = toEntityMap(randomWorld(rng, 24));
    const b = toEntityMap(randomWorld(rng, 24));

    const rebuilt = applyDelta(a, diffEntities(a, b));

    assert.equal(rebuilt.size, b.size, `round ${round}`);
    for (const [id, e] of b) {
      const got = rebuilt.get(id);
      assert.ok(got && entitiesEqual(got, e), `round ${round}, entity ${id}`);
    }
  }
});
