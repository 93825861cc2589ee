// worldcore/shared/errors.ts
//
// Failure taxonomy for the arena core. Each class carries a stable `code`
// that is safe to put on the wire or in a close reason.
//
// None of these ever escape the tick path: the broadcaster and encoder
// catch them and fall back (full resync, dropped frame, closed session).

export type AuthErrorCode =
  | "invalid_token"
  | "expired_token"
  | "anonymous_disabled"
  | "rate_limited"
  | "bot_rejected"
  | "server_full"
  | "handshake_aborted";

export type ProtocolErrorCode =
  | "bad_encoding"
  | "bad_message_shape"
  | "unknown_op"
  | "bad_ack"
  | "not_subscribed"
  | "invalid_state";

export class ArenaError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "ArenaError";
  }
}

export class AuthError extends ArenaError {
  constructor(
    readonly code: AuthErrorCode,
    message: string = code,
  ) {
    super(code, message);
    this.name = "AuthError";
  }
}

export class ProtocolError extends ArenaError {
  constructor(
    readonly code: ProtocolErrorCode,
    message: string = code,
  ) {
    super(code, message);
    this.name = "ProtocolError";
  }
}

/** Baseline missing or inconsistent; recovered by sending a full snapshot. */
export class EncodingFault extends ArenaError {
  constructor(
    message: string,
    readonly sessionId: string,
    readonly baselineTick: number | null,
  ) {
    super("encoding_fault", message);
    this.name = "EncodingFault";
  }
}

export class StorageUnavailable extends ArenaError {
  constructor(message: string, readonly cause?: unknown) {
    super("storage_unavailable", message);
    this.name = "StorageUnavailable";
  }
}

/** Raised inside the outbound queue when even the critical side channel is full. */
export class QueueOverflow extends ArenaError {
  constructor(
    readonly sessionId: string,
    readonly depth: number,
  ) {
    super("queue_overflow", `outbound queue overflow for ${sessionId} (depth ${depth})`);
    this.name = "QueueOverflow";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
