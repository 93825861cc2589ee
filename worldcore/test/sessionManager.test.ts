// worldcore/test/sessionManager.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { UserAgentBotClassifier } from "../auth/BotClassifier";
import type { TokenVerifier, VerifiedToken } from "../auth/TokenVerifier";
import { WordListFilter } from "../chat/ModerationFilter";
import { ArenaConfig, loadArenaConfig } from "../config/ArenaConfig";
import { Broadcaster, FrameSink } from "../core/Broadcaster";
import { Handshake, SessionManager } from "../core/SessionManager";
import { LeaderboardService } from "../leaderboard/LeaderboardService";
import { InMemoryPlayerStore } from "../persistence/InMemoryPlayerStore";
import { PersistenceGateway } from "../persistence/PersistenceGateway";
import type { PlayerStore } from "../persistence/PlayerStore";
import { DecodedFrame, decodeFrame, encodeInbound } from "../protocol/FrameCodec";
import { AuthError, StorageUnavailable } from "../shared/errors";
import { FrameKind } from "../shared/messages";
import type { PlayerId, PlayerRecord } from "../shared/PlayerTypes";
import type { CloseReason, PlayerIdentity, SessionId } from "../shared/Session";
import { SnapshotEncoder } from "../sync/SnapshotEncoder";

const UA = "arena-test-client/1.0";

class FakeVerifier implements TokenVerifier {
  private readonly tokens = new Map<string, VerifiedToken>([
    ["tok-alice", { playerId: "alice", displayName: "Alice", expiresAt: null }],
    ["tok-bob", { playerId: "bob", displayName: "Bob", expiresAt: null }],
  ]);

  verify(token: string): VerifiedToken {
    const v = this.tokens.get(token);
    if (!v) throw new AuthError("invalid_token");
    return v;
  }
}

class RecordingSink implements FrameSink {
  readonly bufferedAmount = 0;
  frames: DecodedFrame[] = [];

  send(data: Buffer, cb: (err?: Error) => void): void {
    this.frames.push(decodeFrame(data));
    cb();
  }

  noticeCodes(): unknown[] {
    return this.frames.filter((f) => f.kind === FrameKind.Notice).map((f) => field(f.body, "code"));
  }
}

class DownStore implements PlayerStore {
  readonly kind = "down";
  private fail(): Promise<never> {
    return Promise.reject(new StorageUnavailable("connection refused"));
  }
  getPlayer(): Promise<PlayerRecord | null> {
    return this.fail();
  }
  upsertPlayer(): Promise<PlayerRecord> {
    return this.fail();
  }
  upsertPeriodScore(): Promise<boolean> {
    return this.fail();
  }
  topScores(): Promise<never> {
    return this.fail();
  }
  async close(): Promise<void> {}
}

/** Holds every player lookup until release() is called. */
class GatedStore extends InMemoryPlayerStore {
  release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  override async getPlayer(playerId: PlayerId): Promise<PlayerRecord | null> {
    await this.gate;
    return super.getPlayer(playerId);
  }
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Object.getOwnPropertyDescriptor(body, key)?.value;
}

function harness(over: Partial<ArenaConfig> = {}, store: PlayerStore = new InMemoryPlayerStore()) {
  const cfg: ArenaConfig = { ...loadArenaConfig({}), ...over };
  const encoder = new SnapshotEncoder(cfg);
  const broadcaster = new Broadcaster(
    {
      queueCapacity: cfg.queueCapacity,
      criticalOverflowCap: cfg.criticalOverflowCap,
      socketHighWaterMark: cfg.socketHighWaterMark,
      staleAfterMs: 0,
    },
    encoder,
  );
  const gateway = new PersistenceGateway(store, cfg);
  const leaderboard = new LeaderboardService();
  const closed: Array<[SessionId, CloseReason]> = [];

  const sessions = new SessionManager(cfg, {
    broadcaster,
    encoder,
    gateway,
    leaderboard,
    verifier: new FakeVerifier(),
    classifier: new UserAgentBotClassifier(),
    filter: new WordListFilter(["noob"]),
    onClosed: (id, reason) => closed.push([id, reason]),
  });

  return { cfg, store, gateway, leaderboard, sessions, closed };
}

type Harness = ReturnType<typeof harness>;

function hs(over: Partial<Handshake> = {}): Handshake {
  return { remoteAddress: "10.0.0.1", userAgent: UA, token: null, sink: new RecordingSink(), ...over };
}

async function openOk(
  h: Harness,
  over: Partial<Handshake> = {},
  now = 1000,
): Promise<{ sessionId: SessionId; identity: PlayerIdentity }> {
  const res = await h.sessions.open(hs(over), now);
  if (!res.ok) assert.fail(`handshake refused: ${res.error.code}`);
  return res;
}

async function refusal(h: Harness, over: Partial<Handshake> = {}, now = 1000): Promise<string> {
  const res = await h.sessions.open(hs(over), now);
  if (res.ok) assert.fail("handshake unexpectedly accepted");
  return res.error.code;
}

test("anonymous handshake yields a guest identity and a session_accepted notice", async () => {
  const h = harness();
  const sink = new RecordingSink();

  const { sessionId, identity } = await openOk(h, { sink });

  assert.deepEqual(identity, { playerId: `anon-${sessionId}`, displayName: "Guest-1", kind: "anonymous" });
  assert.equal(h.sessions.stateOf(sessionId), "authenticated");
  assert.deepEqual(sink.noticeCodes(), ["session_accepted"]);
});

test("handshakes are refused with the matching auth error", async () => {
  assert.equal(await refusal(harness({ authOptional: false })), "anonymous_disabled");
  assert.equal(await refusal(harness(), { token: "forged" }), "invalid_token");
  assert.equal(await refusal(harness(), { userAgent: "Googlebot/2.1" }), "bot_rejected");

  const full = harness({ maxSessions: 1 });
  await openOk(full);
  assert.equal(await refusal(full, { remoteAddress: "10.0.0.2" }), "server_full");
});

test("bots are admitted, tagged, when rejection is off", async () => {
  const h = harness({ rejectBots: false });
  const { sessionId } = await openOk(h, { userAgent: "curl/8.0" });
  assert.equal(h.sessions.get(sessionId)?.trust, "bot");
});

test("handshakes are rate limited per address, v4-mapped v6 included", async () => {
  const h = harness({ handshakeBurst: 2, handshakeRateLimitMs: 1000 });

  await openOk(h, { remoteAddress: "10.0.0.9" }, 1000);
  await openOk(h, { remoteAddress: "::ffff:10.0.0.9" }, 1000);
  assert.equal(await refusal(h, { remoteAddress: "10.0.0.9" }, 1000), "rate_limited");
  await openOk(h, { remoteAddress: "10.0.0.10" }, 1000);
});

test("final write keeps the lifetime best: 500 stored, 300 played, 500 stays", async () => {
  const h = harness();
  await h.store.upsertPlayer({
    playerId: "alice",
    displayName: "Alice",
    bestScore: 500,
    moderation: { chatStrikes: 1 },
    lastSeenAt: 0,
  });

  const { sessionId, identity } = await openOk(h, { token: "tok-alice" });
  assert.equal(identity.kind, "account");

  assert.deepEqual(h.sessions.route(sessionId, encodeInbound({ op: "subscribe", region: null }), 1100), {
    status: "handled",
    op: "subscribe",
  });
  assert.equal(h.sessions.stateOf(sessionId), "active");

  assert.equal(h.sessions.updateScore(sessionId, 300, 1200), true);
  h.leaderboard.applyBatch();
  assert.equal(h.leaderboard.standingOf("alice")?.score, 300);

  h.sessions.drop(sessionId, "client_closed", 2000);
  await h.gateway.settled();

  assert.deepEqual(await h.store.getPlayer("alice"), {
    playerId: "alice",
    displayName: "Alice",
    bestScore: 500,
    moderation: { muted: false, chatStrikes: 1 },
    lastSeenAt: 2000,
  });
  assert.equal(h.leaderboard.standingOf("alice"), undefined);
  assert.deepEqual(h.closed, [[sessionId, "client_closed"]]);
});

test("a new player gets a record at handshake and their peak score on close", async () => {
  const h = harness();
  const { sessionId } = await openOk(h, { token: "tok-bob" });
  assert.equal((await h.store.getPlayer("bob"))?.bestScore, 0);

  h.sessions.route(sessionId, encodeInbound({ op: "subscribe", region: null }), 1100);
  h.sessions.updateScore(sessionId, 800, 1200);
  h.sessions.updateScore(sessionId, 300, 1300);
  h.sessions.drop(sessionId, "client_closed", 2000);
  await h.gateway.settled();

  assert.equal((await h.store.getPlayer("bob"))?.bestScore, 800);
});

test("with the store down a verified player plays on an ephemeral identity", async () => {
  const h = harness({}, new DownStore());
  const { sessionId, identity } = await openOk(h, { token: "tok-alice" });
  assert.equal(identity.kind, "ephemeral");

  h.sessions.drop(sessionId, "client_closed", 2000);
  await h.gateway.settled();

  // The final write waits in the retry buffer
  assert.equal(h.gateway.stats().pendingCritical, 1);
  assert.equal(h.gateway.stats().available, false);
});

test("repeated malformed input closes the session; one valid message resets the count", async () => {
  const h = harness({ drainGraceMs: 0, maxConsecutiveMalformed: 3 });
  const sink = new RecordingSink();
  const { sessionId } = await openOk(h, { sink });
  const bad = Buffer.alloc(0);

  assert.deepEqual(h.sessions.route(sessionId, bad, 1100), { status: "malformed", code: "bad_encoding", strikes: 1 });
  assert.equal(h.sessions.route(sessionId, bad, 1100).status, "malformed");
  assert.deepEqual(h.sessions.route(sessionId, encodeInbound({ op: "ping", t: 5 }), 1100), {
    status: "handled",
    op: "ping",
  });
  h.sessions.route(sessionId, bad, 1100);
  h.sessions.route(sessionId, bad, 1100);
  assert.deepEqual(h.sessions.route(sessionId, bad, 1100), { status: "malformed", code: "bad_encoding", strikes: 3 });

  assert.equal(h.sessions.stateOf(sessionId), undefined);
  assert.deepEqual(h.closed, [[sessionId, "protocol_violation"]]);
  assert.deepEqual(sink.noticeCodes(), [
    "session_accepted",
    "protocol_warning",
    "protocol_warning",
    "pong",
    "protocol_warning",
    "protocol_warning",
    "session_closing",
  ]);
  assert.equal(h.sessions.route(sessionId, bad, 1100).status, "unknown_session");
});

test("ack before subscribe, and anything while draining, is rejected", async () => {
  const h = harness();
  const { sessionId } = await openOk(h);

  assert.deepEqual(h.sessions.route(sessionId, encodeInbound({ op: "ack", tick: 1 }), 1100), {
    status: "rejected",
    op: "ack",
    code: "not_subscribed",
  });

  h.sessions.close(sessionId, "client_closed", 1200);
  assert.equal(h.sessions.stateOf(sessionId), "draining");
  assert.deepEqual(h.sessions.route(sessionId, encodeInbound({ op: "ping" }), 1300), {
    status: "rejected",
    op: "ping",
    code: "invalid_state",
  });
});

test("sweep drains idle sessions, then finalizes them once flushed", async () => {
  const h = harness({ idleTimeoutMs: 60_000, drainGraceMs: 5_000 });
  const { sessionId } = await openOk(h, {}, 1000);
  h.sessions.route(sessionId, encodeInbound({ op: "subscribe", region: null }), 1000);

  assert.deepEqual(h.sessions.sweep(61_000), { idled: 0, finalized: 0 });
  assert.deepEqual(h.sessions.sweep(61_001), { idled: 1, finalized: 0 });
  assert.equal(h.sessions.stateOf(sessionId), "draining");

  assert.deepEqual(h.sessions.sweep(61_002), { idled: 0, finalized: 1 });
  assert.deepEqual(h.closed, [[sessionId, "idle_timeout"]]);
});

test("a handshake whose session was swept while loading is aborted", async () => {
  const store = new GatedStore();
  const h = harness({ idleTimeoutMs: 60_000 }, store);

  const pending = h.sessions.open(hs({ token: "tok-alice" }), 1000);
  assert.equal(h.sessions.count(), 1);
  assert.deepEqual(h.sessions.sweep(61_001), { idled: 0, finalized: 1 });

  store.release();
  const res = await pending;
  assert.equal(res.ok, false);
  if (!res.ok) assert.equal(res.error.code, "handshake_aborted");
  assert.equal(h.sessions.count(), 0);
});
