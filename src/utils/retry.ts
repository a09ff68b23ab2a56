/**
 * Bounded retry with exponential backoff, plus per-attempt timeouts
 */

import { NetworkTimeoutError } from '../execution/errors';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Random spread added on top of the delay, as a fraction of it */
  jitterFactor?: number;
}

export interface RetryOptions extends BackoffOptions {
  maxAttempts: number;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : 'Unknown error'}`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function calculateBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const exponential = options.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, options.maxDelayMs);
  const jitter = capped * (options.jitterFactor ?? 0) * random();
  return Math.floor(capped + jitter);
}

/**
 * Race an operation against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new NetworkTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

/**
 * Run `operation` up to `maxAttempts` times. Throws RetryExhaustedError once
 * the budget is spent.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt < options.maxAttempts) {
        const delayMs = calculateBackoffDelay(attempt, options);
        options.onRetry?.(error, attempt, delayMs);
        await sleep(delayMs);
      }
    }
  }

  throw new RetryExhaustedError(options.maxAttempts, lastError);
}
