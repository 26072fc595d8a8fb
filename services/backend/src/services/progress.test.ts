import { describe, expect, it, vi } from 'vitest';
import { ManualClock } from '../__tests__/utils/manual-clock';
import { ProgressReporter } from './progress';

describe('ProgressReporter', () => {
  it('drops messages inside the throttle window', () => {
    const clock = new ManualClock();
    const observer = vi.fn();
    const reporter = new ProgressReporter(observer, clock, 500);

    expect(reporter.report('first', 0.1)).toBe(true);
    clock.advance(100);
    expect(reporter.report('dropped', 0.2)).toBe(false);
    clock.advance(400);
    expect(reporter.report('second')).toBe(true);

    expect(observer.mock.calls).toEqual([
      ['first', 0.1],
      ['second', undefined]
    ]);
  });

  it('does nothing without an observer', () => {
    const reporter = new ProgressReporter(undefined, new ManualClock(), 500);
    expect(reporter.report('ignored')).toBe(false);
  });

  it('clamps progress into [0, 1]', () => {
    const clock = new ManualClock();
    const observer = vi.fn();
    const reporter = new ProgressReporter(observer, clock, 0);

    reporter.report('over', 1.5);
    reporter.report('under', -1);

    expect(observer.mock.calls).toEqual([
      ['over', 1],
      ['under', 0]
    ]);
  });

  it('keeps going when the observer throws', () => {
    const reporter = new ProgressReporter(() => {
      throw new Error('socket closed');
    }, new ManualClock(), 500);

    expect(reporter.report('message')).toBe(true);
  });
});

describe('ProgressReporter.announce', () => {
  it('bypasses the throttle and restarts it', () => {
    const clock = new ManualClock();
    const observer = vi.fn();
    const reporter = new ProgressReporter(observer, clock, 500);

    reporter.report('first');
    expect(reporter.announce('milestone', 0.5)).toBe(true);
    clock.advance(499);
    expect(reporter.report('dropped')).toBe(false);

    expect(observer.mock.calls).toEqual([
      ['first', undefined],
      ['milestone', 0.5]
    ]);
  });
});
