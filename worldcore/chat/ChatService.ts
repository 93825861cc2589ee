// worldcore/chat/ChatService.ts

import type { ChatBody, ChatScope, NoticeBody } from "../shared/messages";
import type { ModerationFlags } from "../shared/PlayerTypes";
import type { SessionId, SessionView } from "../shared/Session";
import { Logger } from "../utils/logger";
import { RateLimiter } from "../utils/RateLimiter";
import type { ModerationFilter } from "./ModerationFilter";

const log = Logger.scope("CHAT");

/** Session-side view the chat service needs; SessionManager provides it. */
export interface ChatRoster {
  get(sessionId: SessionId): SessionView | undefined;
  moderationOf(sessionId: SessionId): ModerationFlags;
  recordStrike(sessionId: SessionId): void;
  activeSessions(): Iterable<SessionView>;
}

/** Delivery side; the Broadcaster implements it. */
export interface ChatOutlet {
  sendChat(sessionId: SessionId, body: ChatBody): boolean;
  sendNotice(sessionId: SessionId, body: NoticeBody): boolean;
}

export interface ChatRequest {
  text: string;
  scope: ChatScope;
  /** Whisper target: player id or display name. */
  to?: string;
}

export type ChatOutcome =
  | { status: "delivered"; recipients: number; filtered: boolean }
  | { status: "muted" }
  | { status: "rate_limited" }
  | { status: "no_recipient" }
  | { status: "rejected"; reason: "not_joined" | "empty" | "too_long" };

export interface ChatServiceConfig {
  chatRateLimitMs: number;
  chatBurst: number;
  chatMaxLength: number;
}

export class ChatService {
  private readonly limiter: RateLimiter<SessionId>;

  constructor(
    private readonly cfg: ChatServiceConfig,
    private readonly filter: ModerationFilter,
    private readonly roster: ChatRoster,
    private readonly outlet: ChatOutlet,
  ) {
    this.limiter = new RateLimiter({ rateLimitMs: cfg.chatRateLimitMs, burst: cfg.chatBurst });
  }

  send(senderId: SessionId, req: ChatRequest, now = Date.now()): ChatOutcome {
    const sender = this.roster.get(senderId);
    if (!sender || !sender.identity || sender.state !== "active") {
      return { status: "rejected", reason: "not_joined" };
    }

    if (this.roster.moderationOf(senderId).muted) {
      this.outlet.sendNotice(senderId, { code: "chat_muted" });
      return { status: "muted" };
    }

    if (this.limiter.shouldLimit(senderId, now)) {
      this.outlet.sendNotice(senderId, { code: "chat_rate_limited" });
      return { status: "rate_limited" };
    }

    if (req.text.length > this.cfg.chatMaxLength) {
      return { status: "rejected", reason: "too_long" };
    }

    const { text, filtered } = this.filter.filter(req.text);
    if (!text) return { status: "rejected", reason: "empty" };

    if (filtered) {
      this.roster.recordStrike(senderId);
      log.debug("Chat message filtered", { sessionId: senderId, playerId: sender.identity.playerId });
    }

    const targets = this.resolveTargets(sender, req);
    if (targets.length === 0) return { status: "no_recipient" };

    const body: ChatBody = {
      from: sender.identity.displayName,
      fromSessionId: senderId,
      scope: req.scope,
      text,
      t: now,
    };

    let recipients = 0;
    for (const id of targets) {
      if (this.outlet.sendChat(id, body)) recipients++;
    }

    return { status: "delivered", recipients, filtered };
  }

  /** System line to every active session. Goes through the same filter. */
  systemBroadcast(text: string, from = "server", now = Date.now()): number {
    const filtered = this.filter.filter(text).text;
    if (!filtered) return 0;

    const body: ChatBody = { from, fromSessionId: null, scope: "broadcast", text: filtered, t: now };
    let recipients = 0;
    for (const s of this.roster.activeSessions()) {
      if (this.outlet.sendChat(s.id, body)) recipients++;
    }
    log.info("System chat broadcast", { recipients });
    return recipients;
  }

  forget(sessionId: SessionId): void {
    this.limiter.forget(sessionId);
  }

  private resolveTargets(sender: SessionView, req: ChatRequest): SessionId[] {
    const out: SessionId[] = [];

    switch (req.scope) {
      case "broadcast":
        for (const s of this.roster.activeSessions()) out.push(s.id);
        break;

      case "team":
        if (!sender.team) return [sender.id];
        for (const s of this.roster.activeSessions()) {
          if (s.team === sender.team) out.push(s.id);
        }
        break;

      case "whisper": {
        const to = req.to?.toLowerCase();
        if (!to) return [];
        for (const s of this.roster.activeSessions()) {
          if (s.id === sender.id || !s.identity) continue;
          if (s.identity.playerId.toLowerCase() === to || s.identity.displayName.toLowerCase() === to) {
            out.push(s.id);
          }
        }
        // Echo so the sender sees what was actually delivered
        if (out.length > 0) out.push(sender.id);
        break;
      }
    }

    return out;
  }
}
