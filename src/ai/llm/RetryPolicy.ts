/**
 * Support Knowledge Assistant - Retry Policy
 * ==========================================
 * Bounded retry with exponential backoff, expressed as a small state machine:
 *
 *   Calling --ok--> Succeeded
 *   Calling --retryable, attempts left--> RetryWait --> Calling
 *   Calling --fatal or last attempt--> FailedFatal (error rethrown)
 */

import { setTimeout as delay } from 'timers/promises';

export type RetryState = 'calling' | 'retry_wait' | 'succeeded' | 'failed_fatal';

export interface RetryEvent {
  state: RetryState;
  /** Zero-based attempt index the event belongs to */
  attempt: number;
  /** Wait before the next attempt, only set for retry_wait */
  delayMs?: number;
  error?: unknown;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  isRetryable: (err: unknown) => boolean;
  onTransition?: (event: RetryEvent) => void;
  sleep?: SleepFn;
}

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly isRetryable: (err: unknown) => boolean;
  private readonly onTransition?: (event: RetryEvent) => void;
  private readonly sleep: SleepFn;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
    this.isRetryable = options.isRetryable;
    this.onTransition = options.onTransition;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait before the attempt following `attempt`: base * 2^attempt
   */
  delayFor(attempt: number): number {
    return Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 0;

    for (;;) {
      signal?.throwIfAborted();
      this.onTransition?.({ state: 'calling', attempt });

      try {
        const result = await operation(attempt);
        this.onTransition?.({ state: 'succeeded', attempt });
        return result;
      } catch (err) {
        const isLastAttempt = attempt >= this.maxAttempts - 1;

        if (isLastAttempt || !this.isRetryable(err)) {
          this.onTransition?.({ state: 'failed_fatal', attempt, error: err });
          throw err;
        }

        const delayMs = this.delayFor(attempt);
        this.onTransition?.({ state: 'retry_wait', attempt, delayMs, error: err });
        await this.sleep(delayMs, signal);
        attempt++;
      }
    }
  }
}
