// worldcore/utils/RateLimiter.ts

export interface RateLimiterProps {
  /** Time in ms for an empty bucket to refill completely (>= 1). */
  rateLimitMs: number;
  /** Bucket size: actions allowed back to back (>= 1). */
  burst: number;
}

interface BucketState {
  /** Scaled so one action costs `rateLimitMs` and each ms refills `burst`. */
  credit: number;
  at: number;
}

/**
 * Keyed token bucket: each key holds up to `burst` tokens and gets one back
 * every `rateLimitMs / burst` ms. Credit is kept in integer units so the
 * refill is exact.
 *
 * Full buckets are pruned automatically every 256 checks.
 */
export class RateLimiter<K = string> {
  private readonly buckets = new Map<K, BucketState>();
  private readonly rateLimitMs: number;
  private readonly burst: number;
  private readonly capacity: number;
  private pruneCounter = 0;

  constructor(props: RateLimiterProps) {
    this.rateLimitMs = Math.max(1, Math.floor(props.rateLimitMs));
    this.burst = Math.max(1, Math.floor(props.burst));
    this.capacity = this.rateLimitMs * this.burst;
  }

  /** Records an action by `key`. Returns true if it should be blocked. */
  shouldLimit(key: K, now = Date.now()): boolean {
    let state = this.buckets.get(key);
    if (!state) {
      state = { credit: this.capacity, at: now };
      this.buckets.set(key, state);
    }

    state.credit = this.refilled(state, now);
    state.at = Math.max(state.at, now);

    let limited = true;
    if (state.credit >= this.rateLimitMs) {
      state.credit -= this.rateLimitMs;
      limited = false;
    }

    this.pruneCounter = (this.pruneCounter + 1) & 0xff;
    if (this.pruneCounter === 0) this.prune(now);

    return limited;
  }

  forget(key: K): void {
    this.buckets.delete(key);
  }

  /** Drops keys whose bucket has refilled; they behave exactly like new keys. */
  prune(now = Date.now()): void {
    for (const [key, state] of this.buckets) {
      if (this.refilled(state, now) >= this.capacity) this.buckets.delete(key);
    }
  }

  get size(): number {
    return this.buckets.size;
  }

  private refilled(state: BucketState, now: number): number {
    const elapsed = Math.max(0, now - state.at);
    return Math.min(this.capacity, state.credit + elapsed * this.burst);
  }
}

/** Keyed by remote address as reported by the socket (v4 or v6 text form). */
export class IpRateLimiter extends RateLimiter<string> {
  static normalize(address: string): string {
    // Node reports v4 peers on dual-stack sockets as ::ffff:a.b.c.d
    return address.startsWith("::ffff:") ? address.slice(7) : address;
  }

  override shouldLimit(address: string, now = Date.now()): boolean {
    return super.shouldLimit(IpRateLimiter.normalize(address), now);
  }
}
