import { systemClock } from "../utils/clock";
import type { Clock } from "../utils/clock";

/**
 * RateLimiter - Fixed-Cadence Throttle
 *
 * Spaces successive `wait()` calls at least `1000 / ratePerSecond` ms apart.
 * Each worker owns one, so the limit applies per worker. The first call
 * passes immediately; slots missed while idle are not saved up.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private nextSlot: number;

  constructor(ratePerSecond: number, clock: Clock = systemClock) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError(`Rate must be greater than zero, got ${ratePerSecond}`);
    }
    this.intervalMs = 1000 / ratePerSecond;
    this.clock = clock;
    this.nextSlot = clock.now();
  }

  get interval(): number {
    return this.intervalMs;
  }

  async wait(): Promise<void> {
    const now = this.clock.now();
    const delay = Math.max(0, this.nextSlot - now);
    this.nextSlot = Math.max(now, this.nextSlot) + this.intervalMs;
    if (delay > 0) {
      await this.clock.sleep(delay);
    }
  }
}
