//worldcore/core/SessionManager.ts

import type { BotClassifier } from "../auth/BotClassifier";
import type { TokenVerifier, VerifiedToken } from "../auth/TokenVerifier";
import { ChatService, ChatServiceConfig } from "../chat/ChatService";
import type { ModerationFilter } from "../chat/ModerationFilter";
import type { ArenaConfig } from "../config/ArenaConfig";
import type { LeaderboardService } from "../leaderboard/LeaderboardService";
import type { PersistenceGateway } from "../persistence/PersistenceGateway";
import { decodeInbound, RawInbound } from "../protocol/FrameCodec";
import type { Region, WorldTick } from "../shared/Entity";
import { AuthError, ProtocolError, ProtocolErrorCode } from "../shared/errors";
import type { InboundMessage, InboundOp, NoticeBody } from "../shared/messages";
import type { ModerationFlags, PlayerId, PlayerRecord } from "../shared/PlayerTypes";
import type {
  CloseReason,
  PlayerIdentity,
  Session,
  SessionId,
  SessionState,
  SessionView,
} from "../shared/Session";
import type { AckResult, SnapshotEncoder } from "../sync/SnapshotEncoder";
import { Logger } from "../utils/logger";
import { IpRateLimiter } from "../utils/RateLimiter";
import type { Broadcaster, FrameSink, SessionDirectory } from "./Broadcaster";
import type { SessionMetricsSink } from "./ArenaMetrics";
import { InputSink, MessageRouter, RouterHost } from "./MessageRouter";

const log = Logger.scope("SESSIONS");

export type SessionManagerConfig = Pick<
  ArenaConfig,
  | "authOptional"
  | "rejectBots"
  | "maxSessions"
  | "handshakeRateLimitMs"
  | "handshakeBurst"
  | "idleTimeoutMs"
  | "drainGraceMs"
  | "maxConsecutiveMalformed"
> &
  ChatServiceConfig;

export interface SessionManagerDeps {
  broadcaster: Broadcaster;
  encoder: SnapshotEncoder;
  gateway: PersistenceGateway;
  leaderboard: LeaderboardService;
  verifier: TokenVerifier;
  classifier: BotClassifier;
  filter: ModerationFilter;
  input?: InputSink;
  /** Leaderboard state for a session that just became active. */
  onActivated?: (sessionId: SessionId) => void;
  /** The transport closes the socket here. */
  onClosed?: (sessionId: SessionId, reason: CloseReason) => void;
  metrics?: SessionMetricsSink;
}

export interface Handshake {
  remoteAddress: string;
  userAgent: string | null;
  token: string | null;
  sink: FrameSink;
}

export type OpenResult =
  | { ok: true; sessionId: SessionId; identity: PlayerIdentity }
  | { ok: false; error: AuthError };

export type RouteResult =
  | { status: "handled"; op: InboundOp }
  | { status: "rejected"; op: InboundOp; code: ProtocolErrorCode }
  | { status: "malformed"; code: ProtocolErrorCode; strikes: number }
  | { status: "unknown_session" };

export interface SweepResult {
  idled: number;
  finalized: number;
}

export type SessionHealth = Record<SessionState, number> & { total: number };

/**
 * Sole owner of Session objects.
 *
 * State machine: connecting -> authenticated -> active -> draining -> closed.
 * Everything that wants to change a session (router, broadcaster callbacks,
 * heartbeat) goes through a method here.
 */
export class SessionManager implements SessionDirectory, RouterHost {
  private readonly sessions = new Map<SessionId, Session>();
  private readonly handshakes: IpRateLimiter;
  private readonly router: MessageRouter;
  readonly chat: ChatService;

  private counter = 0;

  constructor(
    private readonly cfg: SessionManagerConfig,
    private readonly deps: SessionManagerDeps,
  ) {
    this.handshakes = new IpRateLimiter({ rateLimitMs: cfg.handshakeRateLimitMs, burst: cfg.handshakeBurst });
    this.chat = new ChatService(cfg, deps.filter, this, deps.broadcaster);
    this.router = new MessageRouter(this, this.chat, deps.input);
    deps.broadcaster.bindDirectory(this);
  }

  // ---------------------------------------------------------------------------
  // Handshake
  // ---------------------------------------------------------------------------

  async open(hs: Handshake, now = Date.now()): Promise<OpenResult> {
    if (this.sessions.size >= this.cfg.maxSessions) {
      return this.refuse(hs, new AuthError("server_full"), now);
    }

    if (this.handshakes.shouldLimit(hs.remoteAddress, now)) {
      return this.refuse(hs, new AuthError("rate_limited"), now);
    }

    let verified: VerifiedToken | null = null;
    if (hs.token) {
      try {
        verified = this.deps.verifier.verify(hs.token);
      } catch (err) {
        if (err instanceof AuthError) return this.refuse(hs, err, now);
        throw err;
      }
    } else if (!this.cfg.authOptional) {
      return this.refuse(hs, new AuthError("anonymous_disabled"), now);
    }

    const trust = this.deps.classifier.classify(
      { remoteAddress: hs.remoteAddress, userAgent: hs.userAgent, token: hs.token },
      verified !== null,
    );
    if (trust === "bot" && this.cfg.rejectBots) {
      return this.refuse(hs, new AuthError("bot_rejected"), now);
    }

    const session = this.create(hs.remoteAddress, trust, now);

    const identity = await this.resolveIdentity(session, verified, now);

    // The socket may have gone away while the record was loading.
    if (session.state !== "connecting") {
      return this.refuse(hs, new AuthError("handshake_aborted"), now);
    }

    session.identity = identity;
    session.state = "authenticated";
    session.lastSeen = Math.max(session.lastSeen, now);

    this.deps.broadcaster.attach(session.id, hs.sink);
    this.deps.broadcaster.sendNotice(session.id, {
      code: "session_accepted",
      sessionId: session.id,
      detail: { playerId: identity.playerId, displayName: identity.displayName, kind: identity.kind },
    });

    this.deps.metrics?.recordAccepted(trust, hs.userAgent, this.sessions.size, now);

    log.info("Session authenticated", {
      sessionId: session.id,
      playerId: identity.playerId,
      kind: identity.kind,
      trust,
    });

    return { ok: true, sessionId: session.id, identity };
  }

  private async resolveIdentity(
    session: Session,
    verified: VerifiedToken | null,
    now: number,
  ): Promise<PlayerIdentity> {
    if (!verified) {
      return { playerId: `anon-${session.id}`, displayName: `Guest-${this.counter}`, kind: "anonymous" };
    }

    const loaded = await this.deps.gateway.loadPlayer(verified.playerId);
    switch (loaded.status) {
      case "found":
        session.bestScoreAtOpen = loaded.record.bestScore;
        session.moderation = { ...loaded.record.moderation };
        return { playerId: verified.playerId, displayName: verified.displayName, kind: "account" };

      case "not_found": {
        const record: PlayerRecord = {
          playerId: verified.playerId,
          displayName: verified.displayName,
          bestScore: 0,
          moderation: {},
          lastSeenAt: now,
        };
        const res = await this.deps.gateway.upsertPlayer(record, { now });
        log.debug("Player record created", { playerId: record.playerId, status: res.status });
        return { playerId: verified.playerId, displayName: verified.displayName, kind: "account" };
      }

      case "unavailable":
        log.warn("Player store unavailable; ephemeral identity", {
          sessionId: session.id,
          playerId: verified.playerId,
          error: loaded.error,
        });
        return { playerId: verified.playerId, displayName: verified.displayName, kind: "ephemeral" };
    }
  }

  private refuse(hs: Handshake, error: AuthError, now: number): OpenResult {
    log.info("Handshake refused", { remoteAddress: hs.remoteAddress, code: error.code });
    this.deps.metrics?.recordRefused(error.code, now);
    return { ok: false, error };
  }

  private create(remoteAddress: string, trust: Session["trust"], now: number): Session {
    this.counter++;
    const session: Session = {
      id: `S${now.toString(36)}${this.counter.toString(36)}`,
      state: "connecting",
      identity: null,
      trust,
      remoteAddress,
      region: null,
      team: null,
      lastAckTick: null,
      consecutiveMalformed: 0,
      score: 0,
      peakScore: 0,
      bestScoreAtOpen: 0,
      moderation: {},
      createdAt: now,
      lastSeen: now,
      expiresAt: null,
      closeReason: null,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  route(sessionId: SessionId, raw: RawInbound, now = Date.now()): RouteResult {
    const session = this.sessions.get(sessionId);
    if (!session || session.state === "closed") return { status: "unknown_session" };

    session.lastSeen = Math.max(session.lastSeen, now);

    let msg: InboundMessage;
    try {
      msg = decodeInbound(raw);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      return this.malformed(session, err);
    }

    session.consecutiveMalformed = 0;

    if (session.state === "draining" || session.state === "connecting") {
      return { status: "rejected", op: msg.op, code: "invalid_state" };
    }

    const res = this.router.dispatch(session, msg, now);
    if (res.status === "rejected") {
      log.debug("Inbound message rejected", { sessionId, op: msg.op, code: res.code });
      return { status: "rejected", op: msg.op, code: res.code };
    }
    return { status: "handled", op: msg.op };
  }

  private malformed(session: Session, err: ProtocolError): RouteResult {
    session.consecutiveMalformed++;
    const strikes = session.consecutiveMalformed;

    log.warn("Malformed inbound message dropped", { sessionId: session.id, code: err.code, strikes });

    if (strikes >= this.cfg.maxConsecutiveMalformed) {
      this.close(session.id, "protocol_violation");
    } else if (session.state === "authenticated" || session.state === "active") {
      this.notice(session.id, { code: "protocol_warning", reason: err.code, detail: { strikes } });
    }

    return { status: "malformed", code: err.code, strikes };
  }

  // ---------------------------------------------------------------------------
  // RouterHost
  // ---------------------------------------------------------------------------

  subscribe(sessionId: SessionId, region: Region | null, team: string | null): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || (session.state !== "authenticated" && session.state !== "active")) return false;

    // A new region gets a fresh full snapshot (the encoder sees the change).
    session.region = region;
    session.team = team;

    if (session.state === "authenticated") {
      session.state = "active";
      log.info("Session active", { sessionId, region, team });
      this.deps.onActivated?.(sessionId);
    }
    return true;
  }

  acknowledge(sessionId: SessionId, tick: WorldTick): AckResult {
    const session = this.sessions.get(sessionId);
    if (!session) return "unknown_tick";

    const res = this.deps.encoder.acknowledge(sessionId, tick);
    if (res === "accepted") session.lastAckTick = tick;
    return res;
  }

  notice(sessionId: SessionId, body: NoticeBody): void {
    this.deps.broadcaster.sendNotice(sessionId, body);
  }

  // ---------------------------------------------------------------------------
  // Scores
  // ---------------------------------------------------------------------------

  /** Live score from the simulation. Queued for the next leaderboard batch. */
  updateScore(sessionId: SessionId, score: number, now = Date.now()): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || !session.identity || session.state === "closed") return false;
    if (!Number.isFinite(score)) return false;

    session.score = score;
    session.peakScore = Math.max(session.peakScore, score);
    this.deps.leaderboard.recordScore(session.identity.playerId, score, session.identity.displayName, now);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Close
  // ---------------------------------------------------------------------------

  /**
   * Orderly close: the session stops receiving world frames, gets a
   * session_closing notice, and is finalized once its queue drains or the
   * grace period ends (see sweep()).
   */
  close(sessionId: SessionId, reason: CloseReason, now = Date.now()): void {
    const session = this.sessions.get(sessionId);
    if (!session || session.state === "closed" || session.state === "draining") return;

    if (session.state === "connecting") {
      this.finalize(session, reason, now);
      return;
    }

    session.state = "draining";
    session.closeReason = reason;
    session.expiresAt = now + this.cfg.drainGraceMs;

    this.notice(sessionId, { code: "session_closing", reason });
    log.info("Session draining", { sessionId, reason });

    if (this.deps.broadcaster.pending(sessionId) === 0 && this.cfg.drainGraceMs === 0) {
      this.finalize(session, reason, now);
    }
  }

  /** The transport is gone (socket closed or unusable): finalize now. */
  drop(sessionId: SessionId, reason: CloseReason, now = Date.now()): void {
    const session = this.sessions.get(sessionId);
    if (!session || session.state === "closed") return;
    this.finalize(session, session.closeReason ?? reason, now);
  }

  private finalize(session: Session, reason: CloseReason, now: number): void {
    session.state = "closed";
    session.closeReason = reason;
    this.sessions.delete(session.id);

    const cancelled = this.deps.broadcaster.detach(session.id);
    this.chat.forget(session.id);

    const identity = session.identity;
    if (identity) {
      this.deps.leaderboard.remove(identity.playerId);
      this.deps.gateway.cancelNonCritical(identity.playerId);

      if (identity.kind !== "anonymous") {
        this.deps.gateway.persistFinal(this.finalRecord(session, identity, now));
      }
    }

    this.deps.metrics?.recordClosed(reason, now);

    log.info("Session closed", {
      sessionId: session.id,
      reason,
      cancelledFrames: cancelled,
      lifetimeMs: now - session.createdAt,
    });

    try {
      this.deps.onClosed?.(session.id, reason);
    } catch (err) {
      log.warn("onClosed hook failed", { sessionId: session.id, err });
    }
  }

  private finalRecord(session: Session, identity: PlayerIdentity, now: number): PlayerRecord {
    return {
      playerId: identity.playerId,
      displayName: identity.displayName,
      bestScore: Math.max(session.bestScoreAtOpen, session.peakScore),
      moderation: { ...session.moderation },
      lastSeenAt: Math.max(session.lastSeen, now),
    };
  }

  // ---------------------------------------------------------------------------
  // SessionDirectory (Broadcaster callbacks)
  // ---------------------------------------------------------------------------

  *activeSessions(): Iterable<SessionView> {
    for (const s of this.sessions.values()) {
      if (s.state === "active") yield s;
    }
  }

  onBackpressureOverflow(sessionId: SessionId): void {
    this.drop(sessionId, "backpressure");
  }

  onSendFailure(sessionId: SessionId, err: Error): void {
    log.debug("Send failure", { sessionId, err });
    this.drop(sessionId, "send_failed");
  }

  // ---------------------------------------------------------------------------
  // ChatRoster
  // ---------------------------------------------------------------------------

  get(sessionId: SessionId): SessionView | undefined {
    return this.sessions.get(sessionId);
  }

  moderationOf(sessionId: SessionId): ModerationFlags {
    return { ...(this.sessions.get(sessionId)?.moderation ?? {}) };
  }

  recordStrike(sessionId: SessionId): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    session.moderation.chatStrikes = (session.moderation.chatStrikes ?? 0) + 1;
  }

  /**
   * Admin mute for every live session of a player; carried into their final
   * record. Returns how many sessions were updated.
   */
  setMuted(playerId: PlayerId, muted: boolean): number {
    let n = 0;
    for (const s of this.sessions.values()) {
      if (s.identity?.playerId !== playerId) continue;
      s.moderation.muted = muted;
      n++;
    }
    return n;
  }

  /** Players behind live sessions whose scores are kept (everyone but guests). */
  persistentPlayerIds(): Set<PlayerId> {
    const out = new Set<PlayerId>();
    for (const s of this.sessions.values()) {
      if (s.identity && s.identity.kind !== "anonymous") out.add(s.identity.playerId);
    }
    return out;
  }

  // ---------------------------------------------------------------------------
  // Health / sweep
  // ---------------------------------------------------------------------------

  /**
   * Idle sessions start draining; draining sessions whose queue is empty or
   * whose grace period is over are finalized.
   */
  sweep(now = Date.now()): SweepResult {
    let idled = 0;
    let finalized = 0;

    for (const session of Array.from(this.sessions.values())) {
      switch (session.state) {
        case "connecting":
          if (now - session.createdAt > this.cfg.idleTimeoutMs) {
            this.finalize(session, "idle_timeout", now);
            finalized++;
          }
          break;

        case "authenticated":
        case "active":
          if (now - session.lastSeen > this.cfg.idleTimeoutMs) {
            this.close(session.id, "idle_timeout", now);
            idled++;
          }
          break;

        case "draining": {
          const deadline = session.expiresAt ?? now;
          if (this.deps.broadcaster.pending(session.id) === 0 || now >= deadline) {
            this.finalize(session, session.closeReason ?? "idle_timeout", now);
            finalized++;
          }
          break;
        }

        case "closed":
          break;
      }
    }

    return { idled, finalized };
  }

  /** Start draining everyone (shutdown). */
  closeAll(reason: CloseReason, now = Date.now()): number {
    let n = 0;
    for (const id of Array.from(this.sessions.keys())) {
      this.close(id, reason, now);
      n++;
    }
    return n;
  }

  health(): SessionHealth {
    const out: SessionHealth = { connecting: 0, authenticated: 0, active: 0, draining: 0, closed: 0, total: 0 };
    for (const s of this.sessions.values()) {
      out[s.state]++;
      out.total++;
    }
    return out;
  }

  stateOf(sessionId: SessionId): SessionState | undefined {
    return this.sessions.get(sessionId)?.state;
  }

  count(): number {
    return this.sessions.size;
  }
}
