/**
 * Clock Port - Hexagonal Architecture
 *
 * Every timer in the pipeline (debounce deadlines, poll pacing, retry
 * worker, send timeouts) goes through this port, so tests can drive time
 * by hand instead of sleeping.
 */

/**
 * Opaque handle for a scheduled callback.
 */
export interface ClockTimer {
  /** Epoch ms at which the callback is due */
  readonly dueAt: number;
}

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;

  /**
   * Run `callback` once after `delayMs`.
   * Throws RangeError for a negative or non-finite delay.
   */
  setTimer(callback: () => void, delayMs: number): ClockTimer;

  /** Cancel a timer. Cancelling a fired or unknown timer is a no-op. */
  clearTimer(timer: ClockTimer): void;
}

class SystemTimer implements ClockTimer {
  constructor(
    readonly dueAt: number,
    readonly handle: ReturnType<typeof setTimeout>
  ) {}
}

/**
 * Reject delays that would silently turn into "fire immediately".
 */
export function assertValidDelay(delayMs: number): void {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new RangeError(`Invalid timer delay: ${String(delayMs)}`);
  }
}

/**
 * Wall-clock implementation backed by Date.now and setTimeout.
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  setTimer(callback: () => void, delayMs: number): ClockTimer {
    assertValidDelay(delayMs);
    const handle = setTimeout(callback, delayMs);
    return new SystemTimer(Date.now() + delayMs, handle);
  }

  clearTimer(timer: ClockTimer): void {
    if (timer instanceof SystemTimer) {
      clearTimeout(timer.handle);
    }
  }
}

export function createSystemClock(): Clock {
  return new SystemClock();
}
