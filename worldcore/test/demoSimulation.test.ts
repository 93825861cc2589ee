// worldcore/test/demoSimulation.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { DEFAULT_DEMO_OPTIONS, DemoSimulation } from "../sim/DemoSimulation";

test("same seed, same world", () => {
  const a = new DemoSimulation();
  const b = new DemoSimulation();

  for (let t = 1; t <= 5; t++) {
    assert.deepEqual(a.step(t, 50), b.step(t, 50));
  }
  assert.equal(a.entityCount, DEFAULT_DEMO_OPTIONS.drifters + DEFAULT_DEMO_OPTIONS.orbs);
});

test("an active session gets an avatar and a zero score; closing removes both", () => {
  const sim = new DemoSimulation({ ...DEFAULT_DEMO_OPTIONS, drifters: 0, orbs: 0 });

  sim.onSessionActive("s1");
  const id = sim.avatarOf("s1");
  assert.equal(typeof id, "number");
  assert.deepEqual(sim.drainScores(), [{ sessionId: "s1", score: 0 }]);
  assert.deepEqual(sim.drainScores(), []);

  const [avatar] = sim.step(1, 50);
  assert.equal(avatar?.type, "player");
  assert.equal(avatar?.owner, "s1");

  sim.onSessionClosed("s1");
  assert.equal(sim.avatarOf("s1"), undefined);
  assert.equal(sim.entityCount, 0);
});

test("move input is clamped to max speed; stop zeroes velocity", () => {
  const sim = new DemoSimulation({ ...DEFAULT_DEMO_OPTIONS, drifters: 0, orbs: 0 });
  sim.onSessionActive("s1");

  const input = { sessionId: "s1", playerId: "p1", seq: 1 };
  sim.handleInput({ ...input, command: "move", args: { vx: 1000, vy: -5 } });
  let [avatar] = sim.step(1, 0);
  assert.equal(avatar?.vx, 200);
  assert.equal(avatar?.vy, -5);

  sim.handleInput({ ...input, command: "stop", args: {} });
  [avatar] = sim.step(2, 0);
  assert.equal(avatar?.vx, 0);
  assert.equal(avatar?.direction, 0);
});

test("touching an orb scores and respawns it", () => {
  // A 1x1 arena puts every orb within reach of the avatar
  const sim = new DemoSimulation({ seed: 7, width: 1, height: 1, drifters: 0, orbs: 1 });
  sim.onSessionActive("s1");
  sim.step(1, 50);

  assert.deepEqual(sim.drainScores(), [
    { sessionId: "s1", score: 0 },
    { sessionId: "s1", score: 10 },
  ]);
});
