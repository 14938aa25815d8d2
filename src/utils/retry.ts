import { setTimeout as delay } from 'timers/promises';
import type { RetryConfig } from '../types/index.js';
import { DEFAULTS } from '../constants/index.js';
import { logger } from './logger.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryRunOptions {
  /** Return false to fail immediately without further attempts */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Wait the failure itself asks for, such as a server's retry-after; replaces the backoff */
  requestedDelay?: (error: unknown) => number | undefined;
}

/**
 * Thrown when every attempt failed. `lastError` is the failure of the final attempt.
 */
export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = 'RetryExhaustedError';
  }
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Exponential backoff with jitter.
 *
 * delay(attempt) = min(maxDelayMs, baseDelayMs * 2^(attempt - 1)), then reduced
 * by a random share of up to `jitter` of itself.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(config: RetryConfig = {}, sleep: SleepFn = defaultSleep, random: () => number = Math.random) {
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULTS.RETRY_MAX_ATTEMPTS);
    this.baseDelayMs = Math.max(0, config.baseDelayMs ?? DEFAULTS.RETRY_BASE_DELAY_MS);
    this.maxDelayMs = Math.max(this.baseDelayMs, config.maxDelayMs ?? DEFAULTS.RETRY_MAX_DELAY_MS);
    this.jitter = Math.min(1, Math.max(0, config.jitter ?? DEFAULTS.RETRY_JITTER));
    this.sleep = sleep;
    this.random = random;
  }

  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const capped = Math.min(this.maxDelayMs, exponential);
    return Math.round(capped * (1 - this.jitter * this.random()));
  }

  async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
    const { shouldRetry, signal, onRetry, requestedDelay } = options;
    let attempt = 0;

    while (true) {
      signal?.throwIfAborted();
      attempt++;
      try {
        return await operation(attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        if (shouldRetry && !shouldRetry(error, attempt)) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }
        const waitMs = requestedDelay?.(error) ?? this.delayFor(attempt);
        logger.debug(`Attempt ${attempt}/${this.maxAttempts} failed, retrying in ${waitMs}ms`, { error });
        onRetry?.(error, attempt, waitMs);
        await this.sleep(waitMs, signal);
      }
    }
  }
}
