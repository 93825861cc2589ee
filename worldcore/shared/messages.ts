// worldcore/shared/messages.ts

import type { EntityId, EntityPatch, EntitySnapshot, Region, WorldTick } from "./Entity";
import type { LeaderboardEntry, PlayerId } from "./PlayerTypes";

// -------------------------
// Outbound frame kinds
// -------------------------

export const FrameKind = {
  Full: 1,
  Delta: 2,
  Leaderboard: 3,
  Chat: 4,
  Notice: 5,
} as const;

export type FrameKind = (typeof FrameKind)[keyof typeof FrameKind];

export function isFrameKind(v: number): v is FrameKind {
  return v >= FrameKind.Full && v <= FrameKind.Notice;
}

/** World sync is superseded by the next frame; everything else must arrive. */
export function isCriticalKind(kind: FrameKind): boolean {
  return kind !== FrameKind.Full && kind !== FrameKind.Delta;
}

// -------------------------
// Frame bodies
// -------------------------

export interface FullSnapshotBody {
  entities: EntitySnapshot[];
}

export interface DeltaBody {
  baseline: WorldTick;
  added: EntitySnapshot[];
  updated: EntityPatch[];
  removed: EntityId[];
}

export interface LeaderboardBody {
  /** Entries that are new or whose rank/score changed. */
  upserts: LeaderboardEntry[];
  /** Players that fell out of the published top list. */
  removed: PlayerId[];
  /** Size of the published list after applying this delta. */
  size: number;
}

export type ChatScope = "broadcast" | "team" | "whisper";

export interface ChatBody {
  from: string;
  fromSessionId: string | null;
  scope: ChatScope;
  text: string;
  t: number;
}

export type NoticeCode =
  | "session_accepted"
  | "session_closing"
  | "resync"
  | "chat_rate_limited"
  | "chat_muted"
  | "protocol_warning"
  | "pong";

export interface NoticeBody {
  code: NoticeCode;
  sessionId?: string;
  reason?: string;
  detail?: Record<string, unknown>;
}

export type OutboundFrame =
  | { tick: WorldTick; kind: typeof FrameKind.Full; body: FullSnapshotBody }
  | { tick: WorldTick; kind: typeof FrameKind.Delta; body: DeltaBody }
  | { tick: WorldTick; kind: typeof FrameKind.Leaderboard; body: LeaderboardBody }
  | { tick: WorldTick; kind: typeof FrameKind.Chat; body: ChatBody }
  | { tick: WorldTick; kind: typeof FrameKind.Notice; body: NoticeBody };

/** A world-sync frame as produced by the snapshot encoder. */
export type WorldFrame = Extract<OutboundFrame, { kind: typeof FrameKind.Full | typeof FrameKind.Delta }>;

// -------------------------
// Inbound messages
// -------------------------

export type InboundMessage =
  | { op: "ack"; tick: WorldTick }
  | { op: "subscribe"; region: Region | null; team?: string }
  | { op: "input"; seq: number; command: string; args?: Record<string, unknown> }
  | { op: "chat"; text: string; scope: ChatScope; to?: string }
  | { op: "ping"; t?: number }
  | { op: "leave" };

export type InboundOp = InboundMessage["op"];
