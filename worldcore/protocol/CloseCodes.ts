// worldcore/protocol/CloseCodes.ts

import type { AuthErrorCode } from "../shared/errors";
import type { CloseReason } from "../shared/Session";

// WebSocket close codes. 4000-4999 are application-defined.
export const CloseCode = {
  Normal: 1000,
  GoingAway: 1001,
  TryAgainLater: 1013,
  IdleTimeout: 4000,
  InvalidToken: 4001,
  ProtocolViolation: 4002,
  RateLimited: 4003,
  BotRejected: 4004,
  AnonymousDisabled: 4005,
  Backpressure: 4006,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

export function closeCodeForAuth(code: AuthErrorCode): CloseCode {
  switch (code) {
    case "invalid_token":
    case "expired_token":
      return CloseCode.InvalidToken;
    case "rate_limited":
      return CloseCode.RateLimited;
    case "bot_rejected":
      return CloseCode.BotRejected;
    case "anonymous_disabled":
      return CloseCode.AnonymousDisabled;
    case "server_full":
      return CloseCode.TryAgainLater;
    case "handshake_aborted":
      return CloseCode.Normal;
  }
}

export function closeCodeForReason(reason: CloseReason): CloseCode {
  switch (reason) {
    case "client_closed":
      return CloseCode.Normal;
    case "server_shutdown":
      return CloseCode.GoingAway;
    case "idle_timeout":
      return CloseCode.IdleTimeout;
    case "protocol_violation":
      return CloseCode.ProtocolViolation;
    case "backpressure":
      return CloseCode.Backpressure;
    case "auth_failed":
      return CloseCode.InvalidToken;
    case "send_failed":
      return CloseCode.GoingAway;
  }
}
