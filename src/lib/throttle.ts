export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiter {
  /** Resolves once the caller may make its outbound call. */
  acquire(): Promise<void>;
}

export type LimiterOptions = {
  jitterMs?: number;
  clock?: Clock;
  random?: () => number;
};

/**
 * Enforces a minimum spacing (plus random jitter) between calls. Concurrent
 * callers queue behind each other, so the spacing holds across them.
 */
export class MinIntervalLimiter implements RateLimiter {
  private lastCall: number | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly jitterMs: number;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    private readonly minDelayMs: number,
    options: LimiterOptions = {},
  ) {
    this.jitterMs = options.jitterMs ?? 0;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitTurn());
    this.queue = turn;
    return turn;
  }

  private async waitTurn(): Promise<void> {
    if (this.lastCall !== null) {
      const gap = this.minDelayMs + this.random() * this.jitterMs;
      const wait = this.lastCall + gap - this.clock.now();
      if (wait > 0) await this.clock.sleep(wait);
    }
    this.lastCall = this.clock.now();
  }
}

/** A limiter that never waits, for local work and tests. */
export const unlimited: RateLimiter = {
  acquire: () => Promise.resolve(),
};
