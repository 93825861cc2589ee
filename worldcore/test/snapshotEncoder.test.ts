// worldcore/test/snapshotEncoder.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { EntityId, EntitySnapshot, Region, regionContains, WorldTick } from "../shared/Entity";
import { FrameKind, WorldFrame } from "../shared/messages";
import type { SessionView } from "../shared/Session";
import { applyDelta, EntityMap, toEntityMap } from "../sync/EntityDelta";
import { SnapshotEncoder } from "../sync/SnapshotEncoder";
import { Rng } from "../utils/Rng";

function ent(id: EntityId, x: number, y = 0): EntitySnapshot {
  return { id, type: "ship", x, y, vx: 0, vy: 0, direction: 0, health: 100, owner: null };
}

function view(id: string, region: Region | null = null): SessionView {
  return {
    id,
    state: "active",
    identity: null,
    region,
    team: null,
    lastAckTick: null,
    lastSeen: 0,
    trust: "trusted",
  };
}

function encoder(historyTicks = 8, recencyWindowTicks = 6): SnapshotEncoder {
  return new SnapshotEncoder({ historyTicks, recencyWindowTicks, epsilon: 1e-3 });
}

function fullIds(frame: WorldFrame): EntityId[] {
  if (frame.kind !== FrameKind.Full) assert.fail(`expected full frame, got kind ${frame.kind}`);
  return frame.body.entities.map((e) => e.id);
}

test("first frame for a session is a full snapshot sorted by id", () => {
  const enc = encoder();
  const frame = enc.encode(view("s1"), 1, [ent(3, 0), ent(1, 0), ent(2, 0)]);

  assert.equal(frame.tick, 1);
  assert.deepEqual(fullIds(frame), [1, 2, 3]);
});

test("after an ack the next frame is a delta against the acked tick", () => {
  const enc = encoder();
  const s = view("s1");

  enc.encode(s, 1, [ent(1, 0), ent(2, 0)]);
  assert.equal(enc.acknowledge("s1", 1), "accepted");

  const frame = enc.encode(s, 2, [ent(1, 5), ent(2, 0)]);
  assert.equal(frame.kind, FrameKind.Delta);
  assert.deepEqual(frame.body, { baseline: 1, added: [], updated: [{ id: 1, x: 5 }], removed: [] });
});

test("acks only move forward and only name ticks that were sent", () => {
  const enc = encoder();
  const s1 = view("s1");

  enc.encode(s1, 1, [ent(1, 0)]);
  assert.equal(enc.acknowledge("s1", 1), "accepted");
  enc.encode(view("s2"), 2, [ent(1, 0)]);
  enc.encode(s1, 3, [ent(1, 0)]);

  assert.equal(enc.acknowledge("s1", 5), "unknown_tick");
  assert.equal(enc.acknowledge("s1", 2), "unknown_tick");
  assert.equal(enc.acknowledge("s1", 3), "accepted");
  assert.equal(enc.acknowledge("s1", 1), "stale");
  assert.equal(enc.acknowledge("s1", 3), "stale");
  assert.equal(enc.ackTickOf("s1"), 3);
  assert.equal(enc.acknowledge("nobody", 1), "unknown_tick");
});

test("a baseline older than the recency window gets a full snapshot", () => {
  const enc = encoder(8, 6);
  const s = view("s1");

  enc.encode(s, 1, [ent(1, 0)]);
  enc.acknowledge("s1", 1);
  for (let t = 2; t <= 6; t++) enc.encode(s, t, [ent(1, 0)]);

  assert.equal(enc.encode(s, 7, [ent(1, 0)]).kind, FrameKind.Delta);
  assert.equal(enc.encode(s, 8, [ent(1, 0)]).kind, FrameKind.Full);

  // Tick 1 predates the resync
  assert.equal(enc.acknowledge("s1", 1), "stale");
});

test("a baseline that left history is an encoding fault recovered by a full snapshot", () => {
  const enc = encoder(4, 4);
  const s = view("s1");

  enc.encode(s, 1, [ent(1, 0)]);
  enc.acknowledge("s1", 1);
  for (let t = 2; t <= 4; t++) enc.encode(view("other"), t, [ent(1, 0)]);

  assert.equal(enc.encode(s, 5, [ent(1, 0)]).kind, FrameKind.Full);
  assert.equal(enc.getStats().faults, 1);
});

test("region filters entities, and a region change forces a full snapshot", () => {
  const enc = encoder();
  const region: Region = { minX: 0, minY: 0, maxX: 10, maxY: 10 };

  const f1 = enc.encode(view("s1", region), 1, [ent(1, 5, 5), ent(2, 50, 5)]);
  assert.deepEqual(fullIds(f1), [1]);
  enc.acknowledge("s1", 1);

  const f2 = enc.encode(view("s1", region), 2, [ent(1, 5, 5), ent(2, 6, 6)]);
  assert.equal(f2.kind, FrameKind.Delta);
  assert.deepEqual(f2.body, { baseline: 1, added: [ent(2, 6, 6)], updated: [], removed: [] });
  enc.acknowledge("s1", 2);

  const f3 = enc.encode(view("s1", { minX: 0, minY: 0, maxX: 5, maxY: 5 }), 3, [ent(1, 5, 5), ent(2, 6, 6)]);
  assert.deepEqual(fullIds(f3), [1]);
});

test("resetBaseline and forget both lead to a full snapshot", () => {
  const enc = encoder();
  const s = view("s1");

  enc.encode(s, 1, [ent(1, 0)]);
  enc.acknowledge("s1", 1);
  enc.resetBaseline("s1");
  assert.equal(enc.encode(s, 2, [ent(1, 0)]).kind, FrameKind.Full);

  enc.acknowledge("s1", 2);
  enc.forget("s1");
  assert.equal(enc.acknowledge("s1", 2), "unknown_tick");
  assert.equal(enc.encode(s, 3, [ent(1, 0)]).kind, FrameKind.Full);
});

interface WalkClient {
  session: SessionView;
  /** What the client holds for each tick it was sent. */
  states: Map<WorldTick, EntityMap>;
}

const byId = (a: EntitySnapshot, b: EntitySnapshot): number => a.id - b.id;

test("seeded walk: each frame applied to the client's copy of its baseline gives the recorded view", () => {
  const rng = new Rng("snapshot-encoder-walk");
  const epsilon = 1e-3;
  const enc = new SnapshotEncoder({ historyTicks: 16, recencyWindowTicks: 10, epsilon });
  const clamp = (v: number): number => Math.min(100, Math.max(0, v));

  const world = new Map<EntityId, EntitySnapshot>();
  let nextId = 1;
  for (; nextId <= 12; nextId++) world.set(nextId, ent(nextId, rng.range(0, 100), rng.range(0, 100)));

  const whole: WalkClient = { session: view("whole"), states: new Map() };
  const west: WalkClient = { session: view("west", { minX: 0, minY: 0, maxX: 60, maxY: 100 }), states: new Map() };

  for (let tick = 1; tick <= 200; tick++) {
    for (const [id, e] of Array.from(world)) {
      const roll = rng.next();
      if (roll < 0.03) {
        world.delete(id);
      } else if (roll < 0.35) {
        // Below epsilon on its own; enough of these in a row cross it.
        world.set(id, { ...e, x: clamp(e.x + rng.range(-epsilon / 4, epsilon / 4)) });
      } else if (roll < 0.7) {
        world.set(id, {
          ...e,
          x: clamp(e.x + rng.range(-8, 8)),
          y: clamp(e.y + rng.range(-8, 8)),
          health: rng.int(0, 100),
        });
      }
    }
    if (rng.chance(0.05)) {
      world.set(nextId, ent(nextId, rng.range(0, 100), rng.range(0, 100)));
      nextId++;
    }
    if (tick === 120) west.session = view("west", { minX: 40, minY: 0, maxX: 100, maxY: 100 });

    for (const client of [whole, west]) {
      const frame = enc.encode(client.session, tick, world.values());

      let state: EntityMap;
      if (frame.kind === FrameKind.Full) {
        state = toEntityMap(frame.body.entities);
      } else {
        const base = client.states.get(frame.body.baseline);
        if (!base) assert.fail(`${client.session.id}@${tick}: no client state for baseline ${frame.body.baseline}`);
        state = applyDelta(base, frame.body);
      }
      client.states.set(tick, state);
      client.states.delete(tick - 20);

      const recorded = enc.recordedState(tick);
      if (!recorded) assert.fail(`tick ${tick} not recorded`);
      const expected = Array.from(recorded.values())
        .filter((e) => regionContains(client.session.region, e))
        .sort(byId);
      assert.deepEqual(Array.from(state.values()).sort(byId), expected, `${client.session.id}@${tick}`);

      // Acks arrive late, out of order, and sometimes name ticks the encoder rejects.
      if (rng.chance(0.6)) enc.acknowledge(client.session.id, tick - rng.int(0, 12));
    }
  }

  const stats = enc.getStats();
  assert.ok(stats.deltaFrames > 0, "some frames were deltas");
  assert.ok(stats.fullFrames > 2, "resyncs happened");
  assert.equal(stats.faults, 0);
});
