// worldcore/auth/BotClassifier.ts

import type { TrustLevel } from "../shared/Session";

export interface HandshakeInfo {
  remoteAddress: string;
  userAgent: string | null;
  token: string | null;
}

/**
 * Decides how far the server trusts a connecting client before anything
 * else is known about it. Plug in something smarter than the UA heuristic
 * by implementing this.
 */
export interface BotClassifier {
  classify(info: HandshakeInfo, tokenVerified: boolean): TrustLevel;
}

// Matched case-insensitively against the User-Agent header.
const BOT_MARKERS = ["bot", "crawler", "spider", "headless", "curl/", "wget/", "python-requests", "go-http-client"];

export class UserAgentBotClassifier implements BotClassifier {
  classify(info: HandshakeInfo, tokenVerified: boolean): TrustLevel {
    const ua = (info.userAgent ?? "").toLowerCase();

    if (BOT_MARKERS.some((m) => ua.includes(m))) return "bot";
    if (!ua) return tokenVerified ? "unverified" : "suspect";
    return tokenVerified ? "trusted" : "unverified";
  }
}

export type UserAgentClass = "desktop" | "mobile" | "tablet" | "bot" | "unknown";

/** Coarse device family for metrics. */
export function classifyUserAgent(userAgent: string | null): UserAgentClass {
  const ua = (userAgent ?? "").trim().toLowerCase();
  if (!ua) return "unknown";
  if (BOT_MARKERS.some((m) => ua.includes(m))) return "bot";
  // Android tablets drop "mobile" from the UA; phones keep it.
  if (ua.includes("ipad") || ua.includes("tablet") || (ua.includes("android") && !ua.includes("mobile"))) {
    return "tablet";
  }
  if (ua.includes("mobi") || ua.includes("iphone") || ua.includes("android")) return "mobile";
  return "desktop";
}
