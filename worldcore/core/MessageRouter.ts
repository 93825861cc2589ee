//worldcore/core/MessageRouter.ts

import type { ChatService } from "../chat/ChatService";
import type { Region, WorldTick } from "../shared/Entity";
import type { ProtocolErrorCode } from "../shared/errors";
import type { InboundMessage, NoticeBody } from "../shared/messages";
import type { PlayerId } from "../shared/PlayerTypes";
import type { CloseReason, SessionId, SessionView } from "../shared/Session";
import type { AckResult } from "../sync/SnapshotEncoder";
import { Logger } from "../utils/logger";

const log = Logger.scope("ROUTER");

export interface PlayerInput {
  sessionId: SessionId;
  playerId: PlayerId;
  seq: number;
  command: string;
  args: Record<string, unknown>;
}

/** Where client input goes; the simulation is the only implementer. */
export interface InputSink {
  handleInput(input: PlayerInput): void;
}

/** Session operations the router may invoke. SessionManager implements it. */
export interface RouterHost {
  subscribe(sessionId: SessionId, region: Region | null, team: string | null): boolean;
  acknowledge(sessionId: SessionId, tick: WorldTick): AckResult;
  close(sessionId: SessionId, reason: CloseReason): void;
  notice(sessionId: SessionId, body: NoticeBody): void;
}

export type DispatchResult = { status: "handled" } | { status: "rejected"; code: ProtocolErrorCode };

const HANDLED: DispatchResult = { status: "handled" };

function rejected(code: ProtocolErrorCode): DispatchResult {
  return { status: "rejected", code };
}

/**
 * Dispatches one validated inbound message. Decoding, the malformed-message
 * penalty and state bookkeeping stay in SessionManager.
 */
export class MessageRouter {
  constructor(
    private readonly host: RouterHost,
    private readonly chat: ChatService,
    private readonly input?: InputSink,
  ) {}

  dispatch(session: SessionView, msg: InboundMessage, now: number): DispatchResult {
    const joined = session.state === "active";

    switch (msg.op) {
      case "subscribe":
        if (session.state !== "authenticated" && session.state !== "active") return rejected("invalid_state");
        this.host.subscribe(session.id, msg.region, msg.team ?? null);
        return HANDLED;

      case "ack": {
        if (!joined) return rejected("not_subscribed");
        const res = this.host.acknowledge(session.id, msg.tick);
        if (res === "unknown_tick") {
          log.debug("Ack for a tick never sent", { sessionId: session.id, tick: msg.tick });
          return rejected("bad_ack");
        }
        // "stale" is normal under reordering
        return HANDLED;
      }

      case "input": {
        if (!joined || !session.identity) return rejected("not_subscribed");
        if (!this.input) return HANDLED;
        try {
          this.input.handleInput({
            sessionId: session.id,
            playerId: session.identity.playerId,
            seq: msg.seq,
            command: msg.command,
            args: msg.args ?? {},
          });
        } catch (err) {
          log.warn("Input handler failed", { sessionId: session.id, command: msg.command, err });
        }
        return HANDLED;
      }

      case "chat": {
        const res = this.chat.send(session.id, { text: msg.text, scope: msg.scope, to: msg.to }, now);
        if (res.status === "rejected" && res.reason === "not_joined") return rejected("not_subscribed");
        return HANDLED;
      }

      case "ping":
        this.host.notice(session.id, { code: "pong", detail: { t: msg.t ?? null, serverTime: now } });
        return HANDLED;

      case "leave":
        this.host.close(session.id, "client_closed");
        return HANDLED;
    }
  }
}
