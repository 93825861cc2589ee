// worldcore/core/Broadcaster.ts

import type { EntitySnapshot, WorldTick } from "../shared/Entity";
import { describeError, QueueOverflow } from "../shared/errors";
import {
  ChatBody,
  FrameKind,
  isCriticalKind,
  LeaderboardBody,
  NoticeBody,
  OutboundFrame,
} from "../shared/messages";
import type { SessionId, SessionView } from "../shared/Session";
import { encodeFrame } from "../protocol/FrameCodec";
import { SnapshotEncoder } from "../sync/SnapshotEncoder";
import { Logger } from "../utils/logger";
import { OutboundQueue } from "./OutboundQueue";

const log = Logger.scope("BROADCAST");

/** The part of a socket the broadcaster writes to (a ws WebSocket fits). */
export interface FrameSink {
  readonly bufferedAmount: number;
  send(data: Buffer, cb: (err?: Error) => void): void;
}

/** What the broadcaster needs from the session owner. */
export interface SessionDirectory {
  activeSessions(): Iterable<SessionView>;
  onBackpressureOverflow(sessionId: SessionId): void;
  onSendFailure(sessionId: SessionId, err: Error): void;
}

export interface BroadcasterConfig {
  queueCapacity: number;
  criticalOverflowCap: number;
  socketHighWaterMark: number;
  /** Sessions silent for longer than this get no world frames; 0 disables. */
  staleAfterMs: number;
}

interface Outlet {
  sink: FrameSink;
  queue: OutboundQueue;
  inFlight: number;
}

export interface BroadcastStats {
  ticksPublished: number;
  framesQueued: number;
  framesDropped: number;
  framesSent: number;
  staleSkips: number;
  overflows: number;
}

/**
 * Fans world frames out to every active session once per tick.
 *
 * publish() is synchronous and never waits on a socket: frames go into the
 * session's OutboundQueue and are written as the socket's buffer drains.
 */
export class Broadcaster {
  private readonly outlets = new Map<SessionId, Outlet>();
  private directory: SessionDirectory | null = null;
  private lastTick: WorldTick = 0;

  private readonly stats: BroadcastStats = {
    ticksPublished: 0,
    framesQueued: 0,
    framesDropped: 0,
    framesSent: 0,
    staleSkips: 0,
    overflows: 0,
  };

  constructor(
    private readonly cfg: BroadcasterConfig,
    private readonly encoder: SnapshotEncoder,
  ) {}

  bindDirectory(directory: SessionDirectory): void {
    this.directory = directory;
  }

  currentTick(): WorldTick {
    return this.lastTick;
  }

  attach(sessionId: SessionId, sink: FrameSink): void {
    this.outlets.set(sessionId, {
      sink,
      queue: new OutboundQueue(this.cfg.queueCapacity, this.cfg.criticalOverflowCap),
      inFlight: 0,
    });
  }

  /** Drop the session's outlet; pending frames are cancelled. */
  detach(sessionId: SessionId): number {
    const outlet = this.outlets.get(sessionId);
    if (!outlet) return 0;
    this.outlets.delete(sessionId);
    this.encoder.forget(sessionId);
    return outlet.queue.clear();
  }

  // ---------------------------------------------------------------------------
  // Tick fan-out
  // ---------------------------------------------------------------------------

  publish(tick: WorldTick, entities: readonly EntitySnapshot[], now = Date.now()): void {
    this.lastTick = tick;
    this.stats.ticksPublished++;

    if (!this.directory) return;

    for (const view of this.directory.activeSessions()) {
      if (this.cfg.staleAfterMs > 0 && now - view.lastSeen > this.cfg.staleAfterMs) {
        this.stats.staleSkips++;
        continue;
      }

      try {
        const frame = this.encoder.encode(view, tick, entities);
        this.enqueue(view.id, frame);
      } catch (err) {
        // Contained: this session misses one frame and resyncs later.
        log.warn("World frame for session failed", { sessionId: view.id, tick, err });
        this.encoder.resetBaseline(view.id);
      }
    }

    for (const sessionId of this.outlets.keys()) {
      this.flush(sessionId);
    }
  }

  // ---------------------------------------------------------------------------
  // Critical frames (never dropped by backpressure)
  // ---------------------------------------------------------------------------

  sendNotice(sessionId: SessionId, body: NoticeBody): boolean {
    return this.sendNow(sessionId, { tick: this.lastTick, kind: FrameKind.Notice, body });
  }

  sendChat(sessionId: SessionId, body: ChatBody): boolean {
    return this.sendNow(sessionId, { tick: this.lastTick, kind: FrameKind.Chat, body });
  }

  sendLeaderboard(sessionId: SessionId, body: LeaderboardBody): boolean {
    return this.sendNow(sessionId, { tick: this.lastTick, kind: FrameKind.Leaderboard, body });
  }

  broadcastLeaderboard(body: LeaderboardBody): number {
    if (!this.directory) return 0;
    let sent = 0;
    for (const view of this.directory.activeSessions()) {
      if (this.sendNow(view.id, { tick: this.lastTick, kind: FrameKind.Leaderboard, body })) sent++;
    }
    return sent;
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  pending(sessionId: SessionId): number {
    const outlet = this.outlets.get(sessionId);
    return outlet ? outlet.queue.size + outlet.inFlight : 0;
  }

  getStats(): Readonly<BroadcastStats> {
    return { ...this.stats };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private sendNow(sessionId: SessionId, frame: OutboundFrame): boolean {
    const queued = this.enqueue(sessionId, frame);
    if (queued) this.flush(sessionId);
    return queued;
  }

  private enqueue(sessionId: SessionId, frame: OutboundFrame): boolean {
    const outlet = this.outlets.get(sessionId);
    if (!outlet) return false;

    const data = encodeFrame(frame);
    const outcome = outlet.queue.enqueue({
      tick: frame.tick,
      kind: frame.kind,
      critical: isCriticalKind(frame.kind),
      data,
    });

    switch (outcome.status) {
      case "queued":
      case "spilled":
        this.stats.framesQueued++;
        return true;

      case "queued_after_drop":
        this.stats.framesQueued++;
        this.stats.framesDropped++;
        return true;

      case "dropped_incoming":
        this.stats.framesDropped++;
        return false;

      case "overflow": {
        this.stats.overflows++;
        const overflow = new QueueOverflow(sessionId, outlet.queue.size);
        log.warn("Critical side channel full, closing session", { sessionId, err: overflow });
        this.detach(sessionId);
        this.directory?.onBackpressureOverflow(sessionId);
        return false;
      }
    }
  }

  private flush(sessionId: SessionId): void {
    const outlet = this.outlets.get(sessionId);
    if (!outlet) return;

    while (outlet.queue.peek() && outlet.sink.bufferedAmount < this.cfg.socketHighWaterMark) {
      const frame = outlet.queue.shift();
      if (!frame) break;

      outlet.inFlight++;
      try {
        outlet.sink.send(frame.data, (err) => this.onSent(sessionId, outlet, err));
      } catch (err) {
        outlet.inFlight--;
        this.failOutlet(sessionId, err);
        return;
      }
    }
  }

  private onSent(sessionId: SessionId, outlet: Outlet, err?: Error): void {
    outlet.inFlight = Math.max(0, outlet.inFlight - 1);

    // Outlet may have been detached (session closed) meanwhile.
    if (this.outlets.get(sessionId) !== outlet) return;

    if (err) {
      this.failOutlet(sessionId, err);
      return;
    }

    this.stats.framesSent++;
    if (outlet.queue.size > 0) this.flush(sessionId);
  }

  private failOutlet(sessionId: SessionId, err: unknown): void {
    log.warn("Send failed, dropping outlet", { sessionId, error: describeError(err) });
    this.detach(sessionId);
    this.directory?.onSendFailure(sessionId, err instanceof Error ? err : new Error(String(err)));
  }
}
