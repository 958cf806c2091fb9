export interface RetryPolicyConfig {
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Multiplier per further attempt (>= 1) */
  factor: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Total attempts, the first one included */
  maxAttempts: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  baseDelayMs: 30_000,
  factor: 2,
  maxDelayMs: 30 * 60_000,
  maxAttempts: 8,
};

/**
 * Exponential backoff for delivery retries.
 *
 * delay(n) = min(baseDelayMs * factor^(n-1), maxDelayMs), where n is the
 * number of attempts made so far.
 */
export class RetryPolicy {
  readonly config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    const merged = { ...DEFAULT_RETRY_POLICY, ...config };
    validate(merged);
    this.config = merged;
  }

  delay(attempt: number): number {
    if (!Number.isInteger(attempt) || attempt < 1) {
      throw new RangeError(`attempt must be a positive integer, got ${String(attempt)}`);
    }
    const { baseDelayMs, factor, maxDelayMs } = this.config;
    return Math.min(baseDelayMs * Math.pow(factor, attempt - 1), maxDelayMs);
  }

  /** Whether another attempt is allowed after `attemptCount` attempts */
  canRetry(attemptCount: number): boolean {
    return attemptCount < this.config.maxAttempts;
  }

  nextAttemptAt(now: number, attemptCount: number): number {
    return now + this.delay(attemptCount);
  }
}

function validate(config: RetryPolicyConfig): void {
  const { baseDelayMs, factor, maxDelayMs, maxAttempts } = config;
  if (!Number.isFinite(baseDelayMs) || baseDelayMs <= 0) {
    throw new RangeError(`baseDelayMs must be positive, got ${String(baseDelayMs)}`);
  }
  if (!Number.isFinite(factor) || factor < 1) {
    throw new RangeError(`factor must be >= 1, got ${String(factor)}`);
  }
  if (!Number.isFinite(maxDelayMs) || maxDelayMs < baseDelayMs) {
    throw new RangeError(`maxDelayMs must be >= baseDelayMs, got ${String(maxDelayMs)}`);
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${String(maxAttempts)}`);
  }
}

export function createRetryPolicy(config: Partial<RetryPolicyConfig> = {}): RetryPolicy {
  return new RetryPolicy(config);
}
