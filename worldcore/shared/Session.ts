// worldcore/shared/Session.ts

import type { Region, WorldTick } from "./Entity";
import type { ModerationFlags, PlayerId } from "./PlayerTypes";

export type SessionId = string;

export type SessionState = "connecting" | "authenticated" | "active" | "draining" | "closed";

export type TrustLevel = "trusted" | "unverified" | "suspect" | "bot";

export type CloseReason =
  | "client_closed"
  | "idle_timeout"
  | "protocol_violation"
  | "backpressure"
  | "auth_failed"
  | "send_failed"
  | "server_shutdown";

/**
 * How a session's player is known.
 *  - account: verified token, backed by a PlayerRecord
 *  - ephemeral: verified token but the store was unreachable at handshake
 *  - anonymous: no token at all
 */
export type IdentityKind = "account" | "ephemeral" | "anonymous";

export interface PlayerIdentity {
  playerId: PlayerId;
  displayName: string;
  kind: IdentityKind;
}

/**
 * Owned exclusively by SessionManager. Other components get a SessionView
 * (or just the id) and never hold onto the object.
 */
export interface Session {
  id: SessionId;
  state: SessionState;

  identity: PlayerIdentity | null;
  trust: TrustLevel;
  remoteAddress: string;

  region: Region | null;
  team: string | null;

  lastAckTick: WorldTick | null;
  consecutiveMalformed: number;

  // Score tracked for the final write on close
  score: number;
  peakScore: number;
  bestScoreAtOpen: number;
  moderation: ModerationFlags;

  createdAt: number;
  lastSeen: number;
  /** Draining deadline; null while not draining. */
  expiresAt: number | null;
  closeReason: CloseReason | null;
}

/** Read-only projection handed to the broadcaster / encoder / chat. */
export type SessionView = Readonly<
  Pick<Session, "id" | "state" | "identity" | "region" | "team" | "lastAckTick" | "lastSeen" | "trust">
>;
