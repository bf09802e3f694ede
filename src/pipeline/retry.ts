/**
 * retry.ts — Bounded exponential backoff and abortable sleeps.
 */

import { setTimeout as sleepTimer } from 'node:timers/promises';
import type { RetryPolicy } from '../core/config';

/** Delay before retry number `attempt` (1-based attempt that just failed). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoffBaseMs * 2 ** (attempt - 1);
}

/**
 * Sleep `ms`, resolving early (without throwing) when `signal` aborts.
 * Returns `false` if the sleep was cut short.
 */
export async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;

  try {
    await sleepTimer(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}

export interface AttemptFailure {
  attempt: number;
  error: unknown;
  delayMs: number;
}

/**
 * Run `task` up to `policy.maxAttempts` times.  `shouldRetry` decides whether
 * an error is worth another attempt; non-retryable errors and the last
 * attempt's error are rethrown with the attempt count attached.  An abort
 * during a backoff sleep throws RetryCancelledError instead.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  shouldRetry: (error: unknown) => boolean,
  onRetry?: (failure: AttemptFailure) => void,
  signal?: AbortSignal,
): Promise<{ value: T; attempts: number }> {
  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await task(attempt), attempts: attempt };
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error)) {
        throw new RetryExhaustedError(error, attempt);
      }
      const delayMs = backoffDelay(policy, attempt);
      onRetry?.({ attempt, error, delayMs });
      if (!(await pause(delayMs, signal))) {
        throw new RetryCancelledError(error, attempt);
      }
    }
  }
}

/** Wraps the final error of a retried task together with how many attempts ran. */
export class RetryExhaustedError extends Error {
  constructor(
    readonly lastError: unknown,
    readonly attempts: number,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError), {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

/** The run was cancelled while waiting to retry; nothing more will be attempted. */
export class RetryCancelledError extends Error {
  constructor(
    readonly lastError: unknown,
    readonly attempts: number,
  ) {
    super(`cancelled after ${attempts} attempt(s)`, { cause: lastError });
    this.name = 'RetryCancelledError';
  }
}
