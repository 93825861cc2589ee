// worldcore/test/retryBuffer.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { backoffDelay, RetryBuffer } from "../persistence/RetryBuffer";
import type { PlayerRecord } from "../shared/PlayerTypes";

function rec(playerId: string, bestScore: number, lastSeenAt = 0): PlayerRecord {
  return { playerId, displayName: playerId, bestScore, moderation: {}, lastSeenAt };
}

test("backoff doubles from the base and stops at the cap", () => {
  assert.deepEqual(
    [1, 2, 3, 4, 10].map((n) => backoffDelay(n, 500, 30_000)),
    [500, 1000, 2000, 4000, 30_000],
  );
});

test("a second write for a waiting player merges into the first", () => {
  const buf = new RetryBuffer({ capacity: 4, baseMs: 500, maxMs: 30_000 });
  assert.equal(buf.add(rec("alice", 500), false, 0).status, "queued");
  assert.equal(buf.add(rec("alice", 300), true, 0).status, "merged");

  assert.equal(buf.size, 1);
  const [only] = buf.all();
  assert.equal(only?.record.bestScore, 500);
  assert.equal(only?.critical, true);
});

test("when full, the oldest non-critical write makes room", () => {
  const buf = new RetryBuffer({ capacity: 2, baseMs: 500, maxMs: 30_000 });
  buf.add(rec("a", 1), false, 0);
  buf.add(rec("b", 1), true, 0);

  assert.deepEqual(buf.add(rec("c", 1), false, 0), { status: "queued_after_drop", dropped: "a" });
  assert.deepEqual(buf.add(rec("d", 1), true, 0), { status: "queued_after_drop", dropped: "c" });

  // Only critical entries left: non-critical input is refused, critical input still fits
  assert.deepEqual(buf.add(rec("e", 1), false, 0), { status: "dropped_incoming" });
  assert.deepEqual(buf.add(rec("f", 1), true, 0), { status: "queued" });

  assert.equal(buf.size, 3);
  assert.equal(buf.criticalCount, 3);
  assert.equal(buf.dropped, 3);
});

test("entries come due after their backoff and reschedule further out", () => {
  const buf = new RetryBuffer({ capacity: 4, baseMs: 500, maxMs: 30_000 });
  buf.add(rec("alice", 1), false, 1000);

  assert.equal(buf.due(1499).length, 0);
  assert.equal(buf.due(1500).length, 1);

  buf.reschedule("alice", 1500);
  const [e] = buf.all();
  assert.equal(e?.attempts, 2);
  assert.equal(e?.nextAttemptAt, 2500);
});

test("settle only removes an entry the stored record covers", () => {
  const buf = new RetryBuffer({ capacity: 4, baseMs: 500, maxMs: 30_000 });
  buf.add(rec("alice", 800, 10), true, 0);

  buf.settle("alice", rec("alice", 500, 10));
  assert.equal(buf.size, 1);

  buf.settle("alice", rec("alice", 800, 10));
  assert.equal(buf.size, 0);
});

test("cancelNonCritical leaves critical writes alone", () => {
  const buf = new RetryBuffer({ capacity: 4, baseMs: 500, maxMs: 30_000 });
  buf.add(rec("a", 1), false, 0);
  buf.add(rec("b", 1), true, 0);

  assert.equal(buf.cancelNonCritical("a"), true);
  assert.equal(buf.cancelNonCritical("b"), false);
  assert.deepEqual(buf.all().map((e) => e.record.playerId), ["b"]);
  assert.equal(buf.clear(), 1);
});
