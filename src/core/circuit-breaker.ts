import type { Clock, ClockTimer } from '../ports/index.js';
import type { Logger } from '../types/index.js';
import { SystemClock } from '../ports/index.js';

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  /** Normal operation - calls go through */
  CLOSED = 'CLOSED',
  /** Failing - calls are rejected immediately */
  OPEN = 'OPEN',
  /** One trial call allowed to test recovery */
  HALF_OPEN = 'HALF_OPEN',
}

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /** Consecutive failures before opening the circuit */
  maxFailures: number;
  /** Time in ms before a trial call is allowed */
  resetTimeout: number;
  /** Timeout for individual calls in ms */
  timeout: number;
  /** Name for logging */
  name?: string;
  logger?: Logger;
  /** Time source for timeouts and reset (default: wall clock) */
  clock?: Clock;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  maxFailures: 3,
  resetTimeout: 60_000,
  timeout: 30_000,
};

/**
 * Thrown without calling the operation while the circuit is open.
 */
export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker "${name}" is open`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Thrown when an operation exceeds its timeout.
 */
export class TimeoutError extends Error {
  constructor(timeout: number) {
    super(`Operation timed out after ${String(timeout)}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `operation` with an abort signal that fires after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes first.
 */
export async function withTimeout<T>(
  clock: Clock,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let rejectTimeout: (error: TimeoutError) => void = () => undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    rejectTimeout = reject;
  });

  const timer: ClockTimer = clock.setTimer(() => {
    const error = new TimeoutError(timeoutMs);
    // Reject before aborting: the timeout must win the race
    rejectTimeout(error);
    controller.abort(error);
  }, timeoutMs);

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise]);
  } finally {
    clock.clearTimer(timer);
  }
}

/**
 * Circuit breaker for protecting external calls (classifier, Telegram).
 *
 * CLOSED -> OPEN: after maxFailures consecutive failures
 * OPEN -> HALF_OPEN: after resetTimeout
 * HALF_OPEN -> CLOSED: if the trial call succeeds
 * HALF_OPEN -> OPEN: if the trial call fails
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;
  private readonly name: string;
  private readonly clock: Clock;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.name = this.config.name ?? 'unnamed';
    this.clock = this.config.clock ?? new SystemClock();
  }

  getState(): CircuitState {
    if (this.state === CircuitState.OPEN && this.shouldAttemptReset()) {
      this.state = CircuitState.HALF_OPEN;
      this.log('info', 'Transitioning to HALF_OPEN');
    }
    return this.state;
  }

  /**
   * Execute an operation through the circuit breaker.
   * The signal passed to the operation aborts on timeout.
   */
  async execute<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.getState() === CircuitState.OPEN) {
      this.log('warn', 'Request rejected - circuit is open');
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await withTimeout(this.clock, this.config.timeout, operation);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  getStats(): {
    state: CircuitState;
    failures: number;
    lastFailureTime: number | null;
  } {
    return {
      state: this.getState(),
      failures: this.failures,
      lastFailureTime: this.lastFailureTime,
    };
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === null) {
      return false;
    }
    return this.clock.now() - this.lastFailureTime >= this.config.resetTimeout;
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.log('info', 'Trial call succeeded, closing circuit');
    }
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.lastFailureTime = null;
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = this.clock.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.state = CircuitState.OPEN;
      this.log('warn', 'Trial call failed, reopening circuit');
    } else if (this.failures >= this.config.maxFailures) {
      this.state = CircuitState.OPEN;
      this.log('warn', `Opening circuit after ${String(this.failures)} failures`);
    }
  }

  private log(level: 'info' | 'warn' | 'error', message: string): void {
    if (this.config.logger) {
      this.config.logger[level]({ circuit: this.name, state: this.state }, message);
    }
  }
}

export function createCircuitBreaker(config: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
  return new CircuitBreaker(config);
}
