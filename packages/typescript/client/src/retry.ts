/**
 * Retry policies and the retry loop every client operation runs in
 */

import { isRetriableError } from './errors.js';
import type { Logger } from './logger.js';
import type { TracerDriver } from './providers.js';

/**
 * Waits between retry attempts
 */
export interface RetrySleeper {
  sleepFor(durationMs: number): Promise<void>;
}

export const timerSleeper: RetrySleeper = {
  sleepFor: (durationMs: number) => new Promise(resolve => setTimeout(resolve, durationMs)),
};

/**
 * Decides whether a failed operation is attempted again
 */
export interface RetryPolicy {
  /**
   * @param retryCount - retries performed so far (0 on the first failure)
   * @param elapsedMs - time since the operation was first attempted
   */
  allowRetry(retryCount: number, elapsedMs: number, sleeper: RetrySleeper): Promise<boolean>;
}

/**
 * Retries up to `maxRetries` times, sleeping `sleepBetweenRetries(count)` ms before each
 */
abstract class SleepingRetry implements RetryPolicy {
  constructor(protected readonly maxRetries: number) {}

  protected abstract sleepBetweenRetries(retryCount: number): number;

  async allowRetry(retryCount: number, _elapsedMs: number, sleeper: RetrySleeper): Promise<boolean> {
    if (retryCount >= this.maxRetries) {
      return false;
    }
    const delay = this.sleepBetweenRetries(retryCount);
    if (delay > 0) {
      await sleeper.sleepFor(delay);
    }
    return true;
  }
}

export class RetryNTimes extends SleepingRetry {
  constructor(
    n: number,
    private readonly sleepMs: number
  ) {
    super(n);
  }

  protected sleepBetweenRetries(): number {
    return this.sleepMs;
  }
}

export class RetryOneTime extends RetryNTimes {
  constructor(sleepMs: number) {
    super(1, sleepMs);
  }
}

/**
 * Exponential backoff with jitter (0-25% of the delay), capped at `maxSleepMs`
 */
export class ExponentialBackoffRetry extends SleepingRetry {
  constructor(
    private readonly baseSleepMs: number,
    maxRetries: number,
    private readonly maxSleepMs: number = Number.MAX_SAFE_INTEGER,
    private readonly random: () => number = Math.random
  ) {
    super(maxRetries);
  }

  protected sleepBetweenRetries(retryCount: number): number {
    const exponentialDelay = this.baseSleepMs * Math.pow(2, retryCount);
    const cappedDelay = Math.min(exponentialDelay, this.maxSleepMs);
    const jitter = cappedDelay * this.random() * 0.25;
    return Math.min(cappedDelay + jitter, this.maxSleepMs);
  }
}

export interface RetryLoopOptions {
  policy: RetryPolicy;
  sleeper: RetrySleeper;
  tracer: TracerDriver;
  logger: Logger;
  /** Operation name used in logs */
  name: string;
}

/**
 * Run `fn`, retrying retriable failures for as long as the policy allows
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryLoopOptions): Promise<T> {
  const startTime = Date.now();

  for (let retryCount = 0; ; retryCount++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetriableError(error)) {
        throw error;
      }
      const allowed = await options.policy.allowRetry(retryCount, Date.now() - startTime, options.sleeper);
      if (!allowed) {
        options.tracer.addCount('retries-disallowed', 1);
        throw error;
      }
      options.tracer.addCount('retries-allowed', 1);
      options.logger.warn(`Retrying ${options.name} (attempt ${retryCount + 1})`, error);
    }
  }
}
