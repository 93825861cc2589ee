// worldcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults. Hot-path scopes stay at info so a busy arena
// doesn't print one line per frame.
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "debug",
  ADMIN: "info",
  SESSIONS: "info",
  ROUTER: "info",
  HEARTBEAT: "info",
  TICK: "info",
  BROADCAST: "info",
  ENCODER: "info",
  LEADERBOARD: "info",
  PERSIST: "info",
  CHAT: "info",
  AUTH: "info",
  DB: "info",
};

// Resolution order: LOG_SCOPE_<SCOPE> env, LOG_LEVEL, the table above, "info".
// Read per call so tests can flip LOG_LEVEL without reloading modules.
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  const fromEnv = parseLogLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  const global = parseLogLevel(process.env.LOG_LEVEL);
  if (global) return global;

  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
