// worldcore/protocol/FrameCodec.ts
//
// Wire format for the arena channel.
//
// Outbound (server -> client), one WebSocket binary message per frame:
//
//   offset 0  uint32 BE  tick
//   offset 4  uint8      frame kind (see FrameKind)
//   offset 5  ...        MessagePack body
//
// Inbound (client -> server): a single MessagePack map with an "op" field,
// validated against InboundSchema before anything else looks at it.

import { Packr } from "msgpackr";
import { z } from "zod";

import { ProtocolError } from "../shared/errors";
import { FrameKind, InboundMessage, isFrameKind, OutboundFrame } from "../shared/messages";

export const FRAME_HEADER_BYTES = 5;
export const MAX_INBOUND_BYTES = 16 * 1024;

// Plain maps on the wire so non-JS clients can read frames
const packr = new Packr({ useRecords: false });

const RegionSchema = z
  .object({
    minX: z.number().finite(),
    minY: z.number().finite(),
    maxX: z.number().finite(),
    maxY: z.number().finite(),
  })
  .refine((r) => r.minX <= r.maxX && r.minY <= r.maxY, { message: "empty region" });

export const InboundSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("ack"), tick: z.number().int().min(0).max(0xffffffff) }),
  z.object({
    op: z.literal("subscribe"),
    region: RegionSchema.nullable().default(null),
    team: z.string().min(1).max(32).optional(),
  }),
  z.object({
    op: z.literal("input"),
    seq: z.number().int().min(0),
    command: z.string().min(1).max(64),
    args: z.record(z.unknown()).optional(),
  }),
  z.object({
    op: z.literal("chat"),
    text: z.string().min(1).max(1024),
    scope: z.enum(["broadcast", "team", "whisper"]).default("broadcast"),
    to: z.string().min(1).max(64).optional(),
  }),
  z.object({ op: z.literal("ping"), t: z.number().optional() }),
  z.object({ op: z.literal("leave") }),
]);

export type RawInbound = Buffer | ArrayBuffer | Buffer[] | Uint8Array;

function toBuffer(data: RawInbound): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export function encodeFrame(frame: OutboundFrame): Buffer {
  if (!Number.isInteger(frame.tick) || frame.tick < 0 || frame.tick > 0xffffffff) {
    throw new RangeError(`encodeFrame: tick out of range: ${frame.tick}`);
  }

  const body = packr.pack(frame.body);
  const out = Buffer.allocUnsafe(FRAME_HEADER_BYTES + body.length);
  out.writeUInt32BE(frame.tick, 0);
  out.writeUInt8(frame.kind, 4);
  body.copy(out, FRAME_HEADER_BYTES);
  return out;
}

export interface DecodedFrame {
  tick: number;
  kind: FrameKind;
  body: unknown;
}

/** Client-side decode; the server only uses it in tests and tooling. */
export function decodeFrame(data: RawInbound): DecodedFrame {
  const buf = toBuffer(data);
  if (buf.length < FRAME_HEADER_BYTES) {
    throw new ProtocolError("bad_encoding", "frame shorter than header");
  }

  const tick = buf.readUInt32BE(0);
  const kind = buf.readUInt8(4);
  if (!isFrameKind(kind)) {
    throw new ProtocolError("bad_encoding", `unknown frame kind ${kind}`);
  }

  return { tick, kind, body: packr.unpack(buf.subarray(FRAME_HEADER_BYTES)) };
}

export function encodeInbound(msg: InboundMessage): Buffer {
  return packr.pack(msg);
}

/** Decode + validate one client message. Throws ProtocolError. */
export function decodeInbound(data: RawInbound): InboundMessage {
  const buf = toBuffer(data);
  if (buf.length === 0 || buf.length > MAX_INBOUND_BYTES) {
    throw new ProtocolError("bad_encoding", `inbound size ${buf.length} out of range`);
  }

  let raw: unknown;
  try {
    raw = packr.unpack(buf);
  } catch (err) {
    throw new ProtocolError("bad_encoding", err instanceof Error ? err.message : String(err));
  }

  const parsed = InboundSchema.safeParse(raw);
  if (!parsed.success) {
    const opIssue = parsed.error.issues.find((i) => i.code === "invalid_union_discriminator");
    throw new ProtocolError(opIssue ? "unknown_op" : "bad_message_shape", parsed.error.issues[0]?.message);
  }

  return parsed.data;
}
