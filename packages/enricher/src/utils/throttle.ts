// packages/enricher/src/utils/throttle.ts
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, ms)),
};

/**
 * Minimum spacing between call starts. Anchored to when the previous call
 * began, so a call slower than the delay adds no wait before the next one.
 */
export class Throttle {
  private lastStart: number | null = null;

  constructor(
    readonly delayMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /** Resolves with the time actually slept. */
  async wait(): Promise<number> {
    let waited = 0;
    if (this.lastStart !== null) {
      const remaining = this.lastStart + this.delayMs - this.clock.now();
      if (remaining > 0) {
        await this.clock.sleep(remaining);
        waited = remaining;
      }
    }
    this.lastStart = this.clock.now();
    return waited;
  }
}
