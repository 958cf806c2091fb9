/**
 * ManualClock - a Clock whose time only moves when a test says so.
 */

import type { Clock, ClockTimer } from '../../src/ports/index.js';
import { assertValidDelay } from '../../src/ports/index.js';

class ManualTimer implements ClockTimer {
  constructor(
    readonly dueAt: number,
    readonly seq: number,
    readonly callback: () => void
  ) {}
}

/** Let every queued promise continuation run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

export class ManualClock implements Clock {
  private current: number;
  private seq = 0;
  private timers: ManualTimer[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimer(callback: () => void, delayMs: number): ClockTimer {
    assertValidDelay(delayMs);
    const timer = new ManualTimer(this.current + delayMs, this.seq++, callback);
    this.timers.push(timer);
    return timer;
  }

  clearTimer(timer: ClockTimer): void {
    this.timers = this.timers.filter((t) => t !== timer);
  }

  /** Timers scheduled and not yet fired */
  get pendingTimers(): number {
    return this.timers.length;
  }

  /**
   * Move time forward by `ms`, firing due timers in (dueAt, creation)
   * order. Promise chains settle between timers, so work a timer starts
   * can schedule the next one before time moves on.
   */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    for (;;) {
      await flushPromises();
      const next = this.nextDue(target);
      if (!next) break;
      this.timers = this.timers.filter((t) => t !== next);
      this.current = next.dueAt;
      next.callback();
    }
    this.current = target;
    await flushPromises();
  }

  private nextDue(limit: number): ManualTimer | undefined {
    let next: ManualTimer | undefined;
    for (const timer of this.timers) {
      if (timer.dueAt > limit) continue;
      if (
        next === undefined ||
        timer.dueAt < next.dueAt ||
        (timer.dueAt === next.dueAt && timer.seq < next.seq)
      ) {
        next = timer;
      }
    }
    return next;
  }
}
