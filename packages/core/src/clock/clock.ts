/**
 * Time source injected into every component that reads the time or waits.
 */

/**
 * Handle to a scheduled callback
 */
export interface TimerHandle {
  cancel(): void;
}

/**
 * Clock abstraction
 */
export interface Clock {
  /** Current time (Unix ms) */
  now(): number;
  /** Run `callback` once after `delayMs` */
  schedule(delayMs: number, callback: () => void): TimerHandle;
}

/**
 * Wall clock backed by Date.now and setTimeout
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  schedule(delayMs: number, callback: () => void): TimerHandle {
    const timer = setTimeout(callback, Math.max(0, delayMs));
    // Pending sync timers must not keep the process alive
    timer.unref();
    return {
      cancel: () => clearTimeout(timer),
    };
  }
}

interface VirtualTimer {
  id: number;
  dueAt: number;
  callback: () => void;
}

/**
 * Manually advanced clock for tests
 *
 * @example
 * ```typescript
 * const clock = new VirtualClock(1_000);
 * clock.schedule(500, () => console.log('fired'));
 * clock.advance(500); // logs "fired"
 * ```
 */
export class VirtualClock implements Clock {
  private current: number;
  private timers: VirtualTimer[] = [];
  private nextTimerId = 1;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  schedule(delayMs: number, callback: () => void): TimerHandle {
    const timer: VirtualTimer = {
      id: this.nextTimerId++,
      dueAt: this.current + Math.max(0, delayMs),
      callback,
    };
    this.timers.push(timer);
    return {
      cancel: () => {
        this.timers = this.timers.filter((t) => t.id !== timer.id);
      },
    };
  }

  /**
   * Move time forward, firing due timers in due order
   */
  advance(ms: number): void {
    this.setTime(this.current + ms);
  }

  /**
   * Jump to an absolute time (never backwards)
   */
  setTime(time: number): void {
    const target = Math.max(time, this.current);

    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.timers = this.timers.filter((t) => t.id !== next.id);
      this.current = next.dueAt;
      next.callback();
    }

    this.current = target;
  }

  /** Number of timers not yet fired */
  get pendingTimers(): number {
    return this.timers.length;
  }

  private nextDue(limit: number): VirtualTimer | undefined {
    let next: VirtualTimer | undefined;
    for (const timer of this.timers) {
      if (timer.dueAt > limit) continue;
      if (!next || timer.dueAt < next.dueAt || (timer.dueAt === next.dueAt && timer.id < next.id)) {
        next = timer;
      }
    }
    return next;
  }
}

/** Shared wall clock */
export const systemClock: Clock = new SystemClock();
