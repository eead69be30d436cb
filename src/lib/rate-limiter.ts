import { getLogger } from './logger.js';

/**
 * Request-spacing rate limiter.
 *
 * Permits are never granted closer together than `1 / requestsPerSecond`.
 * One limiter instance is shared by every run that talks to the same API,
 * so concurrent collectors and migrations all queue on the same lock.
 */

const ONE_SECOND = 1_000;

export interface LimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: LimiterClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterSnapshot {
  name: string;
  requestsPerSecond: number;
  permitsGranted: number;
  lastPermitAt: string | null;
}

export class RateLimiter {
  protected rate: number;
  private lastPermitAt: number | null = null;
  private permitsGranted = 0;
  private slotLock: Promise<void> = Promise.resolve();

  constructor(
    readonly name: string,
    requestsPerSecond: number,
    protected readonly clock: LimiterClock = systemClock,
  ) {
    this.rate = assertRate(requestsPerSecond);
  }

  get requestsPerSecond(): number {
    return this.rate;
  }

  /**
   * Wait until the next request is allowed, then record it.
   * Uses a promise-chain mutex so the check of the last permit time and the
   * update that follows it happen for one caller at a time.
   */
  async acquire(): Promise<void> {
    const previous = this.slotLock;
    let resolve!: () => void;
    this.slotLock = new Promise<void>((r) => { resolve = r; });

    await previous;

    try {
      if (this.lastPermitAt !== null) {
        const intervalMs = ONE_SECOND / this.rate;
        const waitMs = this.lastPermitAt + intervalMs - this.clock.now();
        if (waitMs > 0) {
          getLogger().trace({ limiter: this.name, waitMs }, 'Rate limiter: waiting for slot');
          await this.clock.sleep(waitMs);
        }
      }
      this.lastPermitAt = this.clock.now();
      this.permitsGranted++;
    } finally {
      resolve();
    }
  }

  updateRate(requestsPerSecond: number): void {
    this.rate = assertRate(requestsPerSecond);
  }

  snapshot(): RateLimiterSnapshot {
    return {
      name: this.name,
      requestsPerSecond: Math.round(this.rate * 1000) / 1000,
      permitsGranted: this.permitsGranted,
      lastPermitAt: this.lastPermitAt === null ? null : new Date(this.lastPermitAt).toISOString(),
    };
  }
}

export interface AdaptiveBounds {
  minRate?: number;
  maxRate?: number;
}

const DEFAULT_MIN_RATE = 0.1;
const DEFAULT_MAX_RATE = 10;
const SUCCESS_FACTOR = 1.1;
const BACKOFF_FACTOR = 0.5;
const ERROR_FACTOR = 0.8;

/**
 * Rate limiter that tunes itself from response feedback: speeds up slowly on
 * success, backs off on 429s and errors, and always stays within
 * [minRate, maxRate].
 */
export class AdaptiveRateLimiter extends RateLimiter {
  readonly minRate: number;
  readonly maxRate: number;

  constructor(
    name: string,
    requestsPerSecond: number,
    bounds: AdaptiveBounds = {},
    clock: LimiterClock = systemClock,
  ) {
    const minRate = assertRate(bounds.minRate ?? DEFAULT_MIN_RATE);
    const maxRate = assertRate(bounds.maxRate ?? DEFAULT_MAX_RATE);
    if (minRate > maxRate) {
      throw new RangeError(`minRate ${minRate} exceeds maxRate ${maxRate}`);
    }
    super(name, clamp(requestsPerSecond, minRate, maxRate), clock);
    this.minRate = minRate;
    this.maxRate = maxRate;
  }

  onSuccess(): void {
    this.updateRate(clamp(this.rate * SUCCESS_FACTOR, this.minRate, this.maxRate));
  }

  onRateLimited(retryAfterSeconds?: number): void {
    const next = retryAfterSeconds !== undefined && retryAfterSeconds > 0
      ? 1 / retryAfterSeconds
      : this.rate * BACKOFF_FACTOR;
    this.updateRate(clamp(next, this.minRate, this.maxRate));
    getLogger().warn(
      { limiter: this.name, retryAfterSeconds, requestsPerSecond: this.rate },
      'Rate limited: lowering request rate',
    );
  }

  onError(): void {
    this.updateRate(clamp(this.rate * ERROR_FACTOR, this.minRate, this.maxRate));
  }
}

function assertRate(requestsPerSecond: number): number {
  if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
    throw new RangeError(`requestsPerSecond must be a positive number, got ${requestsPerSecond}`);
  }
  return requestsPerSecond;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
