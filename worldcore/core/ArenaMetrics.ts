// worldcore/core/ArenaMetrics.ts
//
// Rolling per-interval counters for the admin metrics endpoint.
// Intervals are aligned to multiples of intervalMs; the last `retention`
// completed intervals are kept.

import { classifyUserAgent, UserAgentClass } from "../auth/BotClassifier";
import type { AuthErrorCode } from "../shared/errors";
import type { CloseReason, TrustLevel } from "../shared/Session";

export interface ArenaMetricsConfig {
  intervalMs: number;
  retention: number;
}

/** Monotonic frame counters, read from the broadcaster. */
export interface FrameCounters {
  framesSent: number;
  framesDropped: number;
  overflows: number;
}

export interface MetricsInterval {
  startedAt: number;
  handshakesAccepted: number;
  refusals: Partial<Record<AuthErrorCode, number>>;
  sessionsByTrust: Partial<Record<TrustLevel, number>>;
  sessionsByUserAgent: Partial<Record<UserAgentClass, number>>;
  closes: Partial<Record<CloseReason, number>>;
  peakSessions: number;
  framesSent: number;
  framesDropped: number;
  overflows: number;
}

export interface MetricsSummary {
  intervalMs: number;
  /** The interval still being filled. */
  current: MetricsInterval;
  /** Completed intervals, oldest first. */
  completed: MetricsInterval[];
}

/** What the session manager reports. */
export interface SessionMetricsSink {
  recordAccepted(trust: TrustLevel, userAgent: string | null, liveSessions: number, now: number): void;
  recordRefused(code: AuthErrorCode, now: number): void;
  recordClosed(reason: CloseReason, now: number): void;
}

const ZERO_FRAMES: FrameCounters = { framesSent: 0, framesDropped: 0, overflows: 0 };

function bump<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export class ArenaMetrics implements SessionMetricsSink {
  private readonly intervalMs: number;
  private readonly retention: number;
  private readonly completed: MetricsInterval[] = [];
  private current: MetricsInterval;
  private frameBase: FrameCounters;

  constructor(
    cfg: ArenaMetricsConfig,
    private readonly frames: () => FrameCounters = () => ZERO_FRAMES,
    now = Date.now(),
  ) {
    this.intervalMs = Math.max(1, cfg.intervalMs);
    this.retention = Math.max(1, cfg.retention);
    this.current = this.emptyInterval(now);
    this.frameBase = { ...this.frames() };
  }

  recordAccepted(trust: TrustLevel, userAgent: string | null, liveSessions: number, now = Date.now()): void {
    const m = this.roll(now);
    m.handshakesAccepted++;
    bump(m.sessionsByTrust, trust);
    bump(m.sessionsByUserAgent, classifyUserAgent(userAgent));
    m.peakSessions = Math.max(m.peakSessions, liveSessions);
  }

  recordRefused(code: AuthErrorCode, now = Date.now()): void {
    bump(this.roll(now).refusals, code);
  }

  recordClosed(reason: CloseReason, now = Date.now()): void {
    bump(this.roll(now).closes, reason);
  }

  /** Heartbeat hook: keeps peaks and interval boundaries current when idle. */
  observe(liveSessions: number, now = Date.now()): void {
    const m = this.roll(now);
    m.peakSessions = Math.max(m.peakSessions, liveSessions);
  }

  summary(now = Date.now()): MetricsSummary {
    const current = this.roll(now);
    return {
      intervalMs: this.intervalMs,
      current: this.withFrames(current, this.frames()),
      completed: this.completed.map((m) => this.copy(m)),
    };
  }

  private roll(now: number): MetricsInterval {
    if (now < this.current.startedAt + this.intervalMs) return this.current;

    const counters = { ...this.frames() };
    this.completed.push(this.withFrames(this.current, counters));
    if (this.completed.length > this.retention) {
      this.completed.splice(0, this.completed.length - this.retention);
    }

    this.frameBase = counters;
    this.current = this.emptyInterval(now);
    return this.current;
  }

  private withFrames(m: MetricsInterval, counters: FrameCounters): MetricsInterval {
    return {
      ...this.copy(m),
      framesSent: counters.framesSent - this.frameBase.framesSent,
      framesDropped: counters.framesDropped - this.frameBase.framesDropped,
      overflows: counters.overflows - this.frameBase.overflows,
    };
  }

  private copy(m: MetricsInterval): MetricsInterval {
    return {
      ...m,
      refusals: { ...m.refusals },
      sessionsByTrust: { ...m.sessionsByTrust },
      sessionsByUserAgent: { ...m.sessionsByUserAgent },
      closes: { ...m.closes },
    };
  }

  private emptyInterval(now: number): MetricsInterval {
    return {
      startedAt: now - (now % this.intervalMs),
      handshakesAccepted: 0,
      refusals: {},
      sessionsByTrust: {},
      sessionsByUserAgent: {},
      closes: {},
      peakSessions: 0,
      framesSent: 0,
      framesDropped: 0,
      overflows: 0,
    };
  }
}
