// worldcore/auth/TokenVerifier.ts

import jwt, { JwtPayload, TokenExpiredError } from "jsonwebtoken";

import { AuthError } from "../shared/errors";
import type { PlayerId } from "../shared/PlayerTypes";
import { Logger } from "../utils/logger";

const log = Logger.scope("AUTH");

export interface VerifiedToken {
  playerId: PlayerId;
  displayName: string;
  /** ms since epoch, or null when the token carries no exp claim */
  expiresAt: number | null;
}

export interface TokenVerifier {
  /** Throws AuthError("invalid_token" | "expired_token"). */
  verify(token: string): VerifiedToken;
}

function isPayloadObject(decoded: string | JwtPayload): decoded is JwtPayload {
  return typeof decoded === "object" && decoded !== null;
}

/**
 * HS256 session tokens. Claims: `sub` is the player id, `displayName` the display
 * name shown on the leaderboard and in chat.
 */
export class JwtTokenVerifier implements TokenVerifier {
  constructor(private readonly secret: string) {}

  verify(token: string): VerifiedToken {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch (err) {
      if (err instanceof TokenExpiredError) {
        throw new AuthError("expired_token");
      }
      log.debug("Token rejected", { err });
      throw new AuthError("invalid_token");
    }

    if (!isPayloadObject(decoded) || typeof decoded.sub !== "string" || decoded.sub.length === 0) {
      throw new AuthError("invalid_token", "token has no subject");
    }

    const name: unknown = decoded["displayName"];
    return {
      playerId: decoded.sub,
      displayName: typeof name === "string" && name.trim() ? name.trim().slice(0, 32) : decoded.sub,
      expiresAt: typeof decoded.exp === "number" ? decoded.exp * 1000 : null,
    };
  }

  /** Dev/test helper; production tokens are minted by the account service. */
  sign(playerId: PlayerId, displayName: string, expiresInSec = 3600): string {
    return jwt.sign({ displayName }, this.secret, {
      algorithm: "HS256",
      subject: playerId,
      expiresIn: expiresInSec,
    });
  }
}
