/**
 * Retry Logic Utility
 * Re-invokes failed operations under a pluggable delay policy
 */

import type { RetryContext } from "@kennelcast/types";
import { NetworkError, isNetworkError, type NetworkErrorCode } from "./errors";

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay in ms after the given failed attempt (1-based) */
  delayFor(attempt: number): number;
  shouldRetry(error: unknown, context: RetryContext): boolean;
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Replaceable for tests; must honour the signal */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (context: RetryContext, error: unknown) => void;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_DELAY_MS = 2000;

/** Retrying cannot change the outcome for these */
const NON_RETRYABLE: ReadonlySet<NetworkErrorCode> = new Set([
  "NO_CONNECTION",
  "DECODING_FAILED",
  "INVALID_URL",
  "INVALID_ENDPOINT",
  "INVALID_REQUEST",
  "CANCELLED",
]);

export function isRetryableError(error: unknown): boolean {
  return !(isNetworkError(error) && NON_RETRYABLE.has(error.code));
}

// ============================================================================
// Policies
// ============================================================================

export function fixedDelayPolicy(
  options: { maxAttempts?: number; delayMs?: number } = {},
): RetryPolicy {
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  return {
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    delayFor: () => delayMs,
    shouldRetry: isRetryableError,
  };
}

export interface ExponentialBackoffOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay added as random jitter */
  jitterRatio?: number;
  random?: () => number;
}

export function exponentialBackoffPolicy(
  options: ExponentialBackoffOptions = {},
): RetryPolicy {
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 10000;
  const jitterRatio = options.jitterRatio ?? 0;
  const random = options.random ?? Math.random;

  return {
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    delayFor: (attempt) => {
      const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
      const jitter = random() * jitterRatio * exponentialDelay;
      return Math.min(exponentialDelay + jitter, maxDelayMs);
    },
    shouldRetry: isRetryableError,
  };
}

// ============================================================================
// Retry Loop
// ============================================================================

/**
 * Sleep for a given number of milliseconds, rejecting with CANCELLED on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(NetworkError.cancelled());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(NetworkError.cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run an operation until it succeeds or the policy gives up.
 * The last error propagates unchanged. A bound that is not a finite number
 * falls back to DEFAULT_MAX_ATTEMPTS.
 */
export async function withRetry<T>(
  operation: (context: RetryContext) => Promise<T>,
  policy: RetryPolicy = fixedDelayPolicy(),
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const bound = Number.isFinite(policy.maxAttempts)
    ? Math.floor(policy.maxAttempts)
    : DEFAULT_MAX_ATTEMPTS;
  const maxAttempts = Math.max(1, bound);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw NetworkError.cancelled();
    }

    const context: RetryContext = {
      attempt,
      maxAttempts,
      delay: policy.delayFor(attempt),
    };

    try {
      return await operation(context);
    } catch (error) {
      if (attempt >= maxAttempts || !policy.shouldRetry(error, context)) {
        throw error;
      }

      options.onRetry?.(context, error);
      await wait(context.delay, options.signal);
    }
  }
}

// ============================================================================
// Retry Handler
// ============================================================================

export class RetryHandler {
  private policy: RetryPolicy;

  constructor(policy: RetryPolicy = fixedDelayPolicy()) {
    this.policy = policy;
  }

  get defaultPolicy(): RetryPolicy {
    return this.policy;
  }

  /**
   * Retry with the default policy, overriding its bound or delay when given
   */
  retry<T>(
    operation: (context: RetryContext) => Promise<T>,
    maxAttempts?: number,
    delayMs?: number,
    options: RetryOptions = {},
  ): Promise<T> {
    return withRetry(operation, this.policyFor(maxAttempts, delayMs), options);
  }

  private policyFor(maxAttempts?: number, delayMs?: number): RetryPolicy {
    if (maxAttempts === undefined && delayMs === undefined) {
      return this.policy;
    }

    const base = this.policy;
    return {
      maxAttempts: maxAttempts ?? base.maxAttempts,
      delayFor: delayMs === undefined ? (attempt) => base.delayFor(attempt) : () => delayMs,
      shouldRetry: (error, context) => base.shouldRetry(error, context),
    };
  }
}
