import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage, isAbortError, isRetryable } from './errors.js';
import { errorMeta, silentLogger, type Logger } from './logger.js';
import type { RetryPolicy } from './types.js';

/** Ceiling applied when a policy asks for unbounded retries (`maxAttempts: -1`) */
export const UNBOUNDED_ATTEMPTS = 1_000_000;

export interface RetryOptions {
  policy: RetryPolicy;
  logger?: Logger;
  signal?: AbortSignal;
  /** Names the task in log lines */
  label?: string;
}

/** A task that failed on every attempt it was given, or hit a terminal error. */
export class RetryError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
    readonly terminal: boolean
  ) {
    super(
      terminal
        ? `failed with a non-retryable error after ${attempts} attempt(s): ${errorMessage(lastError)}`
        : `gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`,
      { cause: lastError }
    );
    this.name = 'RetryError';
  }
}

export function attemptLimit(policy: RetryPolicy): number {
  if (policy.maxAttempts < 0) return UNBOUNDED_ATTEMPTS;
  return Math.max(1, Math.floor(policy.maxAttempts));
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Run `task` until it succeeds, waiting `policy.intervalSeconds` between
 * attempts. Terminal errors stop immediately. Aborts propagate as they are,
 * including during the wait.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const { policy, signal } = options;
  const logger = options.logger ?? silentLogger;
  const label = options.label ?? 'task';
  const limit = attemptLimit(policy);
  const delayMs = Math.max(0, policy.intervalSeconds) * 1000;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();

    try {
      return { value: await task(attempt), attempts: attempt };
    } catch (err) {
      if (isAbortError(err)) throw err;

      if (!isRetryable(err)) {
        logger.error(`${label} failed with a non-retryable error`, {
          attempt,
          ...errorMeta(err),
        });
        throw new RetryError(attempt, err, true);
      }

      if (attempt >= limit) {
        logger.error(`${label} failed after ${attempt} attempt(s)`, errorMeta(err));
        throw new RetryError(attempt, err, false);
      }

      logger.warn(`${label} attempt ${attempt} failed, retrying in ${policy.intervalSeconds}s`, {
        attempt,
        ...errorMeta(err),
      });
    }

    await sleep(delayMs, undefined, { signal });
  }
}
