// worldcore/core/OutboundQueue.ts

import type { WorldTick } from "../shared/Entity";
import type { FrameKind } from "../shared/messages";

export interface QueuedFrame {
  tick: WorldTick;
  kind: FrameKind;
  critical: boolean;
  data: Buffer;
}

export type EnqueueOutcome =
  | { status: "queued" }
  | { status: "queued_after_drop"; dropped: QueuedFrame }
  | { status: "dropped_incoming" }
  | { status: "spilled" }
  | { status: "overflow" };

export interface OutboundQueueStats {
  depth: number;
  spilled: number;
  droppedFrames: number;
}

/**
 * Per-session outbound queue.
 *
 * The main queue never holds more than `capacity` frames. When it is full:
 *  - the oldest non-critical frame is dropped to make room;
 *  - if every queued frame is critical, an incoming non-critical frame is
 *    dropped instead, and an incoming critical frame spills into the side
 *    channel (capped at `sideCap`).
 *
 * Side-channel frames are always newer than main-queue frames; they are
 * promoted as the main queue drains, so shift() order is enqueue order.
 */
export class OutboundQueue {
  private readonly main: QueuedFrame[] = [];
  private readonly side: QueuedFrame[] = [];
  private dropped = 0;

  constructor(
    private readonly capacity: number,
    private readonly sideCap: number,
  ) {}

  enqueue(frame: QueuedFrame): EnqueueOutcome {
    if (this.side.length > 0) {
      // Anything new has to queue behind the side channel to keep order.
      if (!frame.critical) {
        this.dropped++;
        return { status: "dropped_incoming" };
      }
      return this.spill(frame);
    }

    if (this.main.length < this.capacity) {
      this.main.push(frame);
      return { status: "queued" };
    }

    const victimIdx = this.main.findIndex((f) => !f.critical);
    if (victimIdx >= 0) {
      const [dropped] = this.main.splice(victimIdx, 1);
      this.main.push(frame);
      this.dropped++;
      return { status: "queued_after_drop", dropped };
    }

    if (!frame.critical) {
      this.dropped++;
      return { status: "dropped_incoming" };
    }

    return this.spill(frame);
  }

  peek(): QueuedFrame | undefined {
    return this.main[0];
  }

  shift(): QueuedFrame | undefined {
    const next = this.main.shift();
    const promoted = this.side.shift();
    if (promoted) this.main.push(promoted);
    return next;
  }

  clear(): number {
    const n = this.main.length + this.side.length;
    this.main.length = 0;
    this.side.length = 0;
    return n;
  }

  get size(): number {
    return this.main.length + this.side.length;
  }

  get mainDepth(): number {
    return this.main.length;
  }

  get sideDepth(): number {
    return this.side.length;
  }

  stats(): OutboundQueueStats {
    return { depth: this.main.length, spilled: this.side.length, droppedFrames: this.dropped };
  }

  private spill(frame: QueuedFrame): EnqueueOutcome {
    if (this.side.length >= this.sideCap) {
      return { status: "overflow" };
    }
    this.side.push(frame);
    return { status: "spilled" };
  }
}
