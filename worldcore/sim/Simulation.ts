// worldcore/sim/Simulation.ts
// Contract for the gameplay simulation that drives the arena. The core never
// looks inside: it asks for one entity list per tick and forwards input.

import type { InputSink } from "../core/MessageRouter";
import type { EntitySnapshot, WorldTick } from "../shared/Entity";
import type { SessionId } from "../shared/Session";

export interface ScoreUpdate {
  sessionId: SessionId;
  score: number;
}

export interface Simulation extends InputSink {
  /** Advance one tick and return the full entity list for it. */
  step(tick: WorldTick, deltaMs: number): readonly EntitySnapshot[];

  /** Score changes since the last call. */
  drainScores(): readonly ScoreUpdate[];

  /** Session joined/left the world; optional bookkeeping for the sim. */
  onSessionActive?(sessionId: SessionId): void;
  onSessionClosed?(sessionId: SessionId): void;
}
