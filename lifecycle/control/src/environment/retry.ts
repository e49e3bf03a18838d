// environment/retry.ts - Retry strategy for adapter calls

import { calculateBackoff } from "@testyard/contracts";
import type { PlatformOperationError, PlatformOperationErrorCode } from "../platform/errors";

// =============================================================================
// Retry Strategy
// =============================================================================

export interface RetryPolicy {
  /** Total attempts per verb, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
  /** Effective attempt bound for this error code */
  maxAttempts: number;
}

export const ERROR_RETRY_MAPPING: Record<
  PlatformOperationErrorCode,
  {
    retryable: boolean;
    /** Optional tighter bound than the run's retryAttempts */
    maxAttempts?: number;
  }
> = {
  // Retryable -- transient failures where the same request may succeed later
  CAPACITY_ERROR: { retryable: true },
  NETWORK_ERROR: { retryable: true },
  RATE_LIMIT_ERROR: { retryable: true },
  PLATFORM_INTERNAL: { retryable: true },
  TIMEOUT_ERROR: { retryable: true, maxAttempts: 2 },

  // Non-retryable -- deterministic failures, retry won't help
  AUTH_ERROR: { retryable: false },
  INVALID_SPEC: { retryable: false },
  NOT_FOUND: { retryable: false },
  UNSUPPORTED_OPERATION: { retryable: false },
};

/**
 * `attempt` is the 1-based attempt that just failed. Backoff doubles from the
 * base delay; an adapter-supplied retry_after_ms takes precedence.
 */
export function determineRetryStrategy(
  error: Pick<PlatformOperationError, "code" | "retryable" | "retry_after_ms">,
  attempt: number,
  policy: RetryPolicy
): RetryDecision {
  const mapping = ERROR_RETRY_MAPPING[error.code];
  const retryable = mapping.retryable && error.retryable;
  const maxAttempts = Math.min(policy.maxAttempts, mapping.maxAttempts ?? policy.maxAttempts);

  if (!retryable) {
    return { shouldRetry: false, delayMs: 0, maxAttempts: 1 };
  }
  if (attempt >= maxAttempts) {
    return { shouldRetry: false, delayMs: 0, maxAttempts };
  }

  const providerDelay = error.retry_after_ms ?? 0;
  const delayMs =
    providerDelay > 0 ? providerDelay : calculateBackoff(attempt - 1, policy.baseDelayMs, policy.maxDelayMs);

  return { shouldRetry: true, delayMs, maxAttempts };
}
