import { systemClock, type Clock } from '../lib/clock';

export type RateWaitReason = 'quota' | 'spacing';

export interface RateWindowOptions {
  quota: number;
  windowMs: number;
  minIntervalMs: number;
  clock?: Clock;
  onWait?: (waitMs: number, reason: RateWaitReason) => void;
}

/**
 * Sliding-window admission gate. Holds the timestamps of the last `quota`
 * admissions and enforces a minimum spacing between consecutive ones.
 * Admissions are serialized per instance, so every caller that must share
 * a quota has to share the instance.
 */
export class RateWindow {
  private readonly timestamps: number[] = [];
  private readonly quota: number;
  private readonly windowMs: number;
  private readonly minIntervalMs: number;
  private readonly clock: Clock;
  private readonly onWait?: RateWindowOptions['onWait'];
  private lastAdmission: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateWindowOptions) {
    if (!Number.isInteger(options.quota) || options.quota < 1) {
      throw new Error(`quota must be a positive integer (received ${options.quota})`);
    }
    this.quota = options.quota;
    this.windowMs = options.windowMs;
    this.minIntervalMs = options.minIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.onWait = options.onWait;
  }

  /** Waits until a request may be issued, records it and resolves with the admission time. */
  admit(): Promise<number> {
    const admission = this.tail.then(() => this.admitNow());
    this.tail = admission.then(
      () => undefined,
      () => undefined
    );
    return admission;
  }

  /**
   * Forgets the quota history; used when the server resets the quota epoch.
   * The last admission time is kept, so spacing still applies.
   */
  reset(): void {
    this.timestamps.length = 0;
  }

  size(): number {
    return this.timestamps.length;
  }

  snapshot(): readonly number[] {
    return [...this.timestamps];
  }

  private async admitNow(): Promise<number> {
    let now = this.clock.now();
    this.prune(now);

    if (this.timestamps.length >= this.quota) {
      const waitMs = this.windowMs - (now - this.timestamps[0]);
      if (waitMs > 0) {
        this.onWait?.(waitMs, 'quota');
        await this.clock.sleep(waitMs);
      }
      now = this.clock.now();
      this.prune(now);
      while (this.timestamps.length >= this.quota) {
        this.timestamps.shift();
      }
    }

    if (this.lastAdmission !== null) {
      const last = this.lastAdmission;
      // timers may fire slightly early against the wall clock
      while (now - last < this.minIntervalMs) {
        const waitMs = this.minIntervalMs - (now - last);
        this.onWait?.(waitMs, 'spacing');
        await this.clock.sleep(waitMs);
        now = this.clock.now();
      }
    }

    this.timestamps.push(now);
    this.lastAdmission = now;
    return now;
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0 && now - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }
}
