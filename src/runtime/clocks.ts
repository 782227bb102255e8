import { debugLog } from "../utils/debug";

import type { DurationMs } from "../types/brands";

type IntervalHandle = ReturnType<typeof setInterval>;

/**
 * Repeating clock with an adjustable period. Each firing calls `onFire`.
 * stop() is idempotent and a firing that races a stop is dropped.
 */
export class IntervalClock {
  private handle: IntervalHandle | null = null;
  private periodMs: number;

  constructor(
    private readonly name: string,
    periodMs: DurationMs | number,
    private readonly onFire: () => void,
  ) {
    this.periodMs = periodMs;
  }

  get running(): boolean {
    return this.handle !== null;
  }

  get period(): number {
    return this.periodMs;
  }

  start(): void {
    this.stop();
    const handle = setInterval(() => {
      if (this.handle !== handle) return;
      this.onFire();
    }, this.periodMs);
    this.handle = handle;
    debugLog("clock", `${this.name} started`, { periodMs: this.periodMs });
  }

  stop(): void {
    if (this.handle === null) return;
    clearInterval(this.handle);
    this.handle = null;
    debugLog("clock", `${this.name} stopped`);
  }

  /**
   * Change the period. A running clock is restarted on the new period.
   */
  setPeriod(periodMs: number): void {
    if (periodMs === this.periodMs) return;
    this.periodMs = periodMs;
    if (this.running) this.start();
  }
}

export type CountdownCallbacks = {
  onTick?: (remaining: number) => void;
  onExpire: () => void;
};

/**
 * Per-piece countdown: `seconds` display ticks of `tickMs` each. The display
 * counter runs on its own interval; expiry is handed to `onExpire` once and
 * the clock stops itself. Ticks are ignored while suspended.
 */
export class CountdownClock {
  private readonly ticker: IntervalClock;
  private remainingTicks: number;
  private suspended = false;

  constructor(
    private readonly seconds: number,
    tickMs: DurationMs | number,
    private readonly callbacks: CountdownCallbacks,
  ) {
    this.remainingTicks = seconds;
    this.ticker = new IntervalClock("countdown", tickMs, () => this.tick());
  }

  get remaining(): number {
    return this.remainingTicks;
  }

  get running(): boolean {
    return this.ticker.running;
  }

  /** Reset to the full length and start ticking. */
  restart(): void {
    this.remainingTicks = this.seconds;
    this.suspended = false;
    this.ticker.start();
  }

  stop(): void {
    this.ticker.stop();
  }

  /** Reset the counter without starting. */
  reset(): void {
    this.remainingTicks = this.seconds;
  }

  setSuspended(suspended: boolean): void {
    this.suspended = suspended;
  }

  private tick(): void {
    if (this.suspended || this.remainingTicks <= 0) return;
    this.remainingTicks--;
    this.callbacks.onTick?.(this.remainingTicks);
    if (this.remainingTicks === 0) {
      this.ticker.stop();
      debugLog("clock", "countdown expired");
      this.callbacks.onExpire();
    }
  }
}
