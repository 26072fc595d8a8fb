import pino from 'pino';
import { config } from '../config';
import { systemClock, type Clock } from '../lib/clock';
import type { ProgressObserver } from '../types';

const log = pino({ name: 'progress', level: config.logLevel });

/**
 * Forwards status messages to an observer, at most once per `throttleMs`.
 * Messages inside the throttle window are dropped, not queued.
 */
export class ProgressReporter {
  private lastEmission: number | null = null;

  constructor(
    private readonly observer: ProgressObserver | undefined,
    private readonly clock: Clock = systemClock,
    private readonly throttleMs: number = config.rateLimit.progressThrottleMs
  ) {}

  report(message: string, progress?: number): boolean {
    if (!this.observer) {
      return false;
    }

    const now = this.clock.now();
    if (this.lastEmission !== null && now - this.lastEmission < this.throttleMs) {
      return false;
    }
    return this.emit(message, progress);
  }

  /** Emits regardless of the throttle. Used for stage milestones. */
  announce(message: string, progress?: number): boolean {
    return this.emit(message, progress);
  }

  private emit(message: string, progress?: number): boolean {
    if (!this.observer) {
      return false;
    }

    this.lastEmission = this.clock.now();
    try {
      this.observer(message, progress === undefined ? undefined : Math.min(1, Math.max(0, progress)));
    } catch (err) {
      log.warn({ err, message }, 'progress observer threw');
    }
    return true;
  }
}
