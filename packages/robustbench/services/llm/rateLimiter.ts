// Process-wide request budget (sliding window with a FIFO admission queue)

/**
 * Sleep for a specified number of milliseconds
 */
export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Time source used for admission and backoff; tests pass a fake one */
export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

type RateLimiterOptions = {
  requestsPerMinute: number;
  /** Window length, 60s unless a test shortens it */
  periodMs?: number;
  clock?: Clock;
};

/**
 * Admission control for the LLM endpoint.
 *
 * One instance is created per process and handed to every component that
 * sends requests, so the per-minute cap holds across all stages. No window of
 * `periodMs` ever contains more than `capacity` admissions, including the
 * first one after start-up. A caller over budget is suspended until the
 * oldest admission leaves the window; it is never rejected. Callers are
 * admitted in the order they called `acquire()`.
 */
export class RateLimiter {
  readonly capacity: number;
  private readonly periodMs: number;
  private readonly clock: Clock;
  /** Admission times inside the current window, oldest first */
  private readonly admitted: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!(options.requestsPerMinute > 0)) {
      throw new Error(`requestsPerMinute must be positive, got ${options.requestsPerMinute}`);
    }
    this.capacity = options.requestsPerMinute;
    this.periodMs = options.periodMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Wait for one request slot. Resolves with the time spent waiting in ms.
   */
  acquire(): Promise<number> {
    const start = this.clock.now();
    const turn = this.tail.then(() => this.takeSlot());
    this.tail = turn;
    return turn.then(() => this.clock.now() - start);
  }

  /** Slots free in the current window */
  available(): number {
    this.expire(this.clock.now());
    return this.capacity - this.admitted.length;
  }

  private async takeSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.expire(now);
      if (this.admitted.length < this.capacity) {
        this.admitted.push(now);
        return;
      }
      await this.clock.sleep(this.admitted[0] + this.periodMs - now);
    }
  }

  private expire(now: number): void {
    while (this.admitted.length > 0 && this.admitted[0] <= now - this.periodMs) {
      this.admitted.shift();
    }
  }
}
