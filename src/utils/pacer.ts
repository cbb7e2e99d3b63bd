export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Keeps paced calls at least `intervalMs` apart.
 * The first wait() returns immediately; later ones sleep out whatever is left of the interval
 * measured from the previous release(), or from the previous wait() when nothing was released.
 */
export class Pacer {
  private lastCallAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  async wait(): Promise<void> {
    if (this.lastCallAt !== null) {
      const remaining = this.lastCallAt + this.intervalMs - this.clock.now();
      if (remaining > 0) {
        await this.clock.sleep(remaining);
      }
    }
    this.lastCallAt = this.clock.now();
  }

  /**
   * Marks the paced call as finished; the next interval counts from here.
   */
  release() {
    this.lastCallAt = this.clock.now();
  }

  reset() {
    this.lastCallAt = null;
  }
}
