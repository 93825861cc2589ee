// worldcore/test/rateLimiter.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { IpRateLimiter, RateLimiter } from "../utils/RateLimiter";

test("allows `burst` actions back to back, then one per rateLimitMs / burst", () => {
  const rl = new RateLimiter({ rateLimitMs: 1000, burst: 3 });

  assert.deepEqual(
    [0, 100, 200, 300].map((t) => rl.shouldLimit("k", t)),
    [false, false, false, true],
  );
  // 900 credit at 300; 34 ms later the next token is in
  assert.equal(rl.shouldLimit("k", 333), true);
  assert.equal(rl.shouldLimit("k", 334), false);
  assert.equal(rl.shouldLimit("k", 335), true);
  assert.equal(rl.shouldLimit("other", 300), false);
});

test("a burst straddling a window boundary is not doubled", () => {
  const rl = new RateLimiter({ rateLimitMs: 1000, burst: 3 });

  const results = [999, 999, 999, 1000, 1000, 1000].map((t) => rl.shouldLimit("k", t));
  assert.deepEqual(results, [false, false, false, true, true, true]);

  // Fully refilled a whole rateLimitMs later
  assert.deepEqual(
    [1999, 1999, 1999, 1999].map((t) => rl.shouldLimit("k", t)),
    [false, false, false, true],
  );
});

test("forget and prune drop keys", () => {
  const rl = new RateLimiter<number>({ rateLimitMs: 100, burst: 1 });
  rl.shouldLimit(1, 0);
  rl.shouldLimit(2, 50);
  assert.equal(rl.shouldLimit(1, 10), true);

  rl.forget(1);
  assert.equal(rl.shouldLimit(1, 10), false);

  rl.prune(130);
  assert.equal(rl.size, 1);
});

test("v4-mapped v6 addresses share a bucket with their v4 form", () => {
  assert.equal(IpRateLimiter.normalize("::ffff:192.0.2.7"), "192.0.2.7");
  assert.equal(IpRateLimiter.normalize("2001:db8::1"), "2001:db8::1");

  const rl = new IpRateLimiter({ rateLimitMs: 1000, burst: 1 });
  assert.equal(rl.shouldLimit("192.0.2.7", 0), false);
  assert.equal(rl.shouldLimit("::ffff:192.0.2.7", 1), true);
});
