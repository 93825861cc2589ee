// worldcore/core/Heartbeat.ts

import type { SessionManager, SweepResult } from "./SessionManager";
import { Logger } from "../utils/logger";

export interface HeartbeatConfig {
  intervalMs: number; // how often to sweep sessions
  /** Told the live session count after every sweep. */
  onSwept?: (liveSessions: number, now: number) => void;
}

const log = Logger.scope("HEARTBEAT");

/**
 * Periodic session sweep:
 *  - idle sessions start draining
 *  - draining sessions are finalized once flushed or past their grace period
 *
 * Does not run gameplay ticks (TickEngine does).
 */
export function startHeartbeat(sessions: SessionManager, cfg: HeartbeatConfig): NodeJS.Timeout {
  // Coarse-grained cleanup loop; sub-100ms sweeps buy nothing.
  const intervalMs = Math.max(cfg.intervalMs, 100);

  log.info("Starting heartbeat", { intervalMs });

  let sweepCount = 0;

  const handle = setInterval(() => {
    sweepCount++;

    const now = Date.now();
    let result: SweepResult;
    try {
      result = sessions.sweep(now);
      cfg.onSwept?.(sessions.count(), now);
    } catch (err) {
      log.warn("Heartbeat sweep failed", { err });
      return;
    }

    // Only log summaries occasionally or when we actually did work
    if (result.idled > 0 || result.finalized > 0 || sweepCount % 30 === 0) {
      log.debug("Heartbeat sweep complete", {
        sweep: sweepCount,
        sessions: sessions.count(),
        idled: result.idled,
        finalized: result.finalized,
      });
    }
  }, intervalMs);

  handle.unref?.();

  return handle;
}
