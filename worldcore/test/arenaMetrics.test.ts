// worldcore/test/arenaMetrics.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { ArenaMetrics, FrameCounters } from "../core/ArenaMetrics";

test("an interval counts handshakes, closes and frame deltas", () => {
  let frames: FrameCounters = { framesSent: 0, framesDropped: 0, overflows: 0 };
  const m = new ArenaMetrics({ intervalMs: 1000, retention: 2 }, () => frames, 0);

  m.recordAccepted("trusted", "Mozilla/5.0 (iPhone; CPU iPhone OS 17_5 like Mac OS X) Mobile/15E148", 1, 100);
  m.recordAccepted("suspect", null, 2, 200);
  m.recordRefused("rate_limited", 300);
  m.recordRefused("rate_limited", 310);
  m.recordRefused("bot_rejected", 320);
  frames = { framesSent: 10, framesDropped: 2, overflows: 0 };
  m.recordClosed("idle_timeout", 900);

  assert.deepEqual(m.summary(950), {
    intervalMs: 1000,
    current: {
      startedAt: 0,
      handshakesAccepted: 2,
      refusals: { rate_limited: 2, bot_rejected: 1 },
      sessionsByTrust: { trusted: 1, suspect: 1 },
      sessionsByUserAgent: { mobile: 1, unknown: 1 },
      closes: { idle_timeout: 1 },
      peakSessions: 2,
      framesSent: 10,
      framesDropped: 2,
      overflows: 0,
    },
    completed: [],
  });
});

test("intervals roll on aligned boundaries and keep only the retained ones", () => {
  let frames: FrameCounters = { framesSent: 0, framesDropped: 0, overflows: 0 };
  const m = new ArenaMetrics({ intervalMs: 1000, retention: 2 }, () => frames, 0);

  frames = { framesSent: 25, framesDropped: 2, overflows: 1 };
  m.observe(1, 1500);

  const first = m.summary(1600);
  assert.equal(first.current.startedAt, 1000);
  assert.equal(first.current.peakSessions, 1);
  assert.equal(first.current.framesSent, 0);
  assert.equal(first.completed.length, 1);
  assert.equal(first.completed[0]?.startedAt, 0);
  assert.equal(first.completed[0]?.framesSent, 25);
  assert.equal(first.completed[0]?.framesDropped, 2);
  assert.equal(first.completed[0]?.overflows, 1);

  frames = { framesSent: 31, framesDropped: 2, overflows: 1 };
  m.observe(0, 2100);
  m.observe(0, 3100);

  const later = m.summary(3200);
  assert.deepEqual(
    later.completed.map((c) => [c.startedAt, c.framesSent]),
    [
      [1000, 6],
      [2000, 0],
    ],
  );
  assert.equal(later.current.startedAt, 3000);
});

test("summaries are copies", () => {
  const m = new ArenaMetrics({ intervalMs: 1000, retention: 2 }, undefined, 0);
  m.recordRefused("server_full", 10);

  const s = m.summary(20);
  s.current.refusals.server_full = 99;
  assert.deepEqual(m.summary(30).current.refusals, { server_full: 1 });
});
