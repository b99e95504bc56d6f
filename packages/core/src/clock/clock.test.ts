import { describe, it, expect, vi } from 'vitest';
import { SystemClock, VirtualClock } from './clock.js';

describe('VirtualClock', () => {
  it('should start at the given time and only move when advanced', () => {
    const clock = new VirtualClock(1_000);
    expect(clock.now()).toBe(1_000);
    clock.advance(250);
    expect(clock.now()).toBe(1_250);
  });

  it('should fire timers in due order and report the due time to callbacks', () => {
    const clock = new VirtualClock(0);
    const fired: Array<[string, number]> = [];

    clock.schedule(300, () => fired.push(['late', clock.now()]));
    clock.schedule(100, () => fired.push(['early', clock.now()]));
    clock.schedule(100, () => fired.push(['early-2', clock.now()]));

    clock.advance(200);
    expect(fired).toEqual([
      ['early', 100],
      ['early-2', 100],
    ]);
    expect(clock.pendingTimers).toBe(1);

    clock.advance(100);
    expect(fired[2]).toEqual(['late', 300]);
    expect(clock.pendingTimers).toBe(0);
  });

  it('should fire timers scheduled by a firing timer within the same advance', () => {
    const clock = new VirtualClock(0);
    const fired: number[] = [];

    clock.schedule(10, () => {
      fired.push(clock.now());
      clock.schedule(10, () => fired.push(clock.now()));
    });

    clock.advance(50);
    expect(fired).toEqual([10, 20]);
    expect(clock.now()).toBe(50);
  });

  it('should not fire cancelled timers', () => {
    const clock = new VirtualClock(0);
    const callback = vi.fn();
    const handle = clock.schedule(10, callback);

    handle.cancel();
    clock.advance(100);
    expect(callback).not.toHaveBeenCalled();
  });

  it('should never move backwards', () => {
    const clock = new VirtualClock(500);
    clock.setTime(100);
    expect(clock.now()).toBe(500);
  });
});

describe('SystemClock', () => {
  it('should run callbacks through setTimeout', () => {
    vi.useFakeTimers();
    try {
      const clock = new SystemClock();
      const callback = vi.fn();
      clock.schedule(1_000, callback);

      vi.advanceTimersByTime(999);
      expect(callback).not.toHaveBeenCalled();
      vi.advanceTimersByTime(1);
      expect(callback).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should cancel a scheduled callback', () => {
    vi.useFakeTimers();
    try {
      const clock = new SystemClock();
      const callback = vi.fn();
      clock.schedule(10, callback).cancel();
      vi.advanceTimersByTime(100);
      expect(callback).not.toHaveBeenCalled();
    } finally {
      vi.useRealTimers();
    }
  });
});
