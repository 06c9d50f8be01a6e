/**
 * REQUEST COALESCER
 * =================
 *
 * Per-key single flight. Each key moves IDLE → BUILDING → READY → IDLE:
 * the first caller starts the build, callers arriving while it is BUILDING
 * are parked on the same promise, and once it settles every parked caller
 * receives that one result and the key is IDLE again.
 *
 * If 10 requests miss the same cache key at once, the build runs once.
 */

export type FlightState = 'IDLE' | 'BUILDING';

interface Flight<T> {
  promise: Promise<T>;
  joined: number;
}

export class RequestCoalescer<T> {
  private inflight = new Map<string, Flight<T>>();
  private started = 0;
  private joinedTotal = 0;

  /**
   * Run `fn` for `key`, or join the build already running for it.
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      existing.joined++;
      this.joinedTotal++;
      return existing.promise;
    }

    // fn starts on the next microtask, after the flight is registered
    const promise = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, { promise, joined: 0 });
    this.started++;
    return promise;
  }

  state(key: string): FlightState {
    return this.inflight.has(key) ? 'BUILDING' : 'IDLE';
  }

  /** Callers currently parked on the key's build. */
  waiters(key: string): number {
    return this.inflight.get(key)?.joined ?? 0;
  }

  /**
   * Resolves once the key's build (or, without a key, every build) has
   * settled, whatever its outcome.
   */
  async settled(key?: string): Promise<void> {
    const flights =
      key === undefined
        ? Array.from(this.inflight.values())
        : [this.inflight.get(key)].filter((f): f is Flight<T> => f !== undefined);
    await Promise.allSettled(flights.map((f) => f.promise));
  }

  size(): number {
    return this.inflight.size;
  }

  keys(): string[] {
    return Array.from(this.inflight.keys());
  }

  stats() {
    return {
      inflight: this.inflight.size,
      started: this.started,
      joined: this.joinedTotal,
    };
  }
}
