// worldcore/test/auth.test.ts

import test from "node:test";
import assert from "node:assert/strict";
import jwt from "jsonwebtoken";

import { classifyUserAgent, UserAgentBotClassifier } from "../auth/BotClassifier";
import { JwtTokenVerifier } from "../auth/TokenVerifier";
import { CloseCode, closeCodeForAuth, closeCodeForReason } from "../protocol/CloseCodes";
import { AuthError, AuthErrorCode } from "../shared/errors";

const SECRET = "test-secret";

function authCode(code: AuthErrorCode) {
  return (err: unknown): boolean => err instanceof AuthError && err.code === code;
}

test("signed tokens verify to the subject and display name", () => {
  const v = new JwtTokenVerifier(SECRET);
  const res = v.verify(v.sign("player-1", "  Ada  "));

  assert.equal(res.playerId, "player-1");
  assert.equal(res.displayName, "Ada");
  assert.equal(typeof res.expiresAt, "number");
});

test("display name falls back to the subject and is capped at 32 chars", () => {
  const v = new JwtTokenVerifier(SECRET);
  assert.equal(v.verify(jwt.sign({}, SECRET, { subject: "player-2" })).displayName, "player-2");
  assert.equal(v.verify(v.sign("player-3", "n".repeat(40))).displayName, "n".repeat(32));
});

test("wrong secret, missing subject and expiry are rejected with distinct codes", () => {
  const v = new JwtTokenVerifier(SECRET);

  assert.throws(() => v.verify(new JwtTokenVerifier("other-secret").sign("p", "P")), authCode("invalid_token"));
  assert.throws(() => v.verify(jwt.sign({ displayName: "P" }, SECRET)), authCode("invalid_token"));
  assert.throws(() => v.verify("not-a-token"), authCode("invalid_token"));

  const expired = jwt.sign({ displayName: "P", exp: Math.floor(Date.now() / 1000) - 60 }, SECRET, { subject: "p" });
  assert.throws(() => v.verify(expired), authCode("expired_token"));
});

test("bot classifier: markers mean bot, verified tokens raise trust", () => {
  const c = new UserAgentBotClassifier();
  const info = (userAgent: string | null) => ({ remoteAddress: "10.0.0.1", userAgent, token: null });

  assert.equal(c.classify(info("HeadlessChrome/120"), true), "bot");
  assert.equal(c.classify(info("python-requests/2.31"), false), "bot");
  assert.equal(c.classify(info(null), false), "suspect");
  assert.equal(c.classify(info(""), true), "unverified");
  assert.equal(c.classify(info("Mozilla/5.0"), false), "unverified");
  assert.equal(c.classify(info("Mozilla/5.0"), true), "trusted");
});

test("refusals and close reasons map to websocket close codes", () => {
  assert.equal(closeCodeForAuth("expired_token"), CloseCode.InvalidToken);
  assert.equal(closeCodeForAuth("server_full"), 1013);
  assert.equal(closeCodeForAuth("bot_rejected"), 4004);
  assert.equal(closeCodeForReason("idle_timeout"), 4000);
  assert.equal(closeCodeForReason("backpressure"), CloseCode.Backpressure);
  assert.equal(closeCodeForReason("server_shutdown"), CloseCode.GoingAway);
});

test("user agents fall into coarse device classes", () => {
  assert.equal(classifyUserAgent(null), "unknown");
  assert.equal(classifyUserAgent("  "), "unknown");
  assert.equal(classifyUserAgent("Mozilla/5.0 (Windows NT 10.0; Win64; x64) Firefox/126.0"), "desktop");
  assert.equal(classifyUserAgent("Mozilla/5.0 (iPhone; CPU iPhone OS 17_5 like Mac OS X) Mobile/15E148"), "mobile");
  assert.equal(classifyUserAgent("Mozilla/5.0 (Linux; Android 14; Pixel 8) Mobile Safari/537.36"), "mobile");
  assert.equal(classifyUserAgent("Mozilla/5.0 (Linux; Android 13; SM-X710) Safari/537.36"), "tablet");
  assert.equal(classifyUserAgent("Mozilla/5.0 (iPad; CPU OS 17_5 like Mac OS X)"), "tablet");
  assert.equal(classifyUserAgent("curl/8.5.0"), "bot");
});
