// src/core/retry/policy.ts

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface RetryPolicyOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before retry n (0-based); the last value repeats */
  backoffMs: readonly number[];
}

export interface RetryHooks {
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryExhaustedError';
  }
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private backoffMs: readonly number[];

  constructor(
    options: RetryPolicyOptions,
    private clock: Clock = systemClock
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.backoffMs = options.backoffMs;
  }

  delayFor(retryIndex: number): number {
    if (this.backoffMs.length === 0) return 0;
    return this.backoffMs[Math.min(retryIndex, this.backoffMs.length - 1)];
  }

  /**
   * Runs `operation` until it succeeds, `shouldRetry` rejects the error, or
   * attempts run out. Errors that are not retried are rethrown as they are;
   * running out of attempts throws `RetryExhaustedError`.
   */
  async run<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks): Promise<RetryOutcome<T>> {
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        const value = await operation(attempt);
        return { value, attempts: attempt };
      } catch (error) {
        if (!hooks.shouldRetry(error)) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }
        const delay = this.delayFor(attempt - 1);
        hooks.onRetry?.(attempt, delay, error);
        await this.clock.sleep(delay);
      }
    }
  }
}
