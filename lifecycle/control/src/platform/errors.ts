// platform/errors.ts - Classified adapter failures
//
// Adapters throw these so the lifecycle can tell transient failures from
// deterministic ones. Anything unclassified counts as PLATFORM_INTERNAL.

import type { PlatformName } from "./types";

export type PlatformOperationErrorCode =
  | "CAPACITY_ERROR"
  | "AUTH_ERROR"
  | "RATE_LIMIT_ERROR"
  | "INVALID_SPEC"
  | "NETWORK_ERROR"
  | "TIMEOUT_ERROR"
  | "NOT_FOUND"
  | "PLATFORM_INTERNAL"
  | "UNSUPPORTED_OPERATION";

export interface PlatformOperationErrorOptions {
  /** Default false */
  retryable?: boolean;
  /** Overrides the computed backoff for the next attempt */
  retry_after_ms?: number;
  details?: Record<string, unknown>;
}

export class PlatformOperationError extends Error {
  readonly retryable: boolean;
  readonly retry_after_ms?: number;
  readonly details?: Record<string, unknown>;

  constructor(
    readonly platform: PlatformName,
    readonly code: PlatformOperationErrorCode,
    message: string,
    options: PlatformOperationErrorOptions = {}
  ) {
    super(message);
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
    this.retry_after_ms = options.retry_after_ms;
    this.details = options.details;
  }
}

// =============================================================================
// Common Failures
// =============================================================================

/** The template exists but nothing is free to back it right now. */
export class CapacityError extends PlatformOperationError {
  constructor(platform: PlatformName, readonly template: string, retryAfterMs?: number) {
    super(platform, "CAPACITY_ERROR", `Insufficient capacity for template ${template}`, {
      retryable: true,
      retry_after_ms: retryAfterMs,
      details: { template },
    });
  }
}

export class AuthError extends PlatformOperationError {
  constructor(platform: PlatformName, message: string) {
    super(platform, "AUTH_ERROR", message);
  }
}

export class RateLimitError extends PlatformOperationError {
  constructor(platform: PlatformName, retryAfterMs: number) {
    super(platform, "RATE_LIMIT_ERROR", `Rate limited by ${platform}, retry after ${retryAfterMs}ms`, {
      retryable: true,
      retry_after_ms: retryAfterMs,
    });
  }
}

/** The template cannot work as configured; retrying will not help. */
export class InvalidSpecError extends PlatformOperationError {
  constructor(platform: PlatformName, readonly template: string, reason: string) {
    super(platform, "INVALID_SPEC", `Invalid template ${template}: ${reason}`, { details: { template, reason } });
  }
}

// =============================================================================
// Mapping
// =============================================================================

/**
 * Unknown failures become PLATFORM_INTERNAL. They are retryable: an adapter
 * that did not classify its error gets the benefit of the doubt, bounded by
 * the retry budget.
 */
export function mapPlatformOperationError(platform: PlatformName, error: unknown): PlatformOperationError {
  if (error instanceof PlatformOperationError) return error;

  const message = error instanceof Error ? error.message : String(error);
  return new PlatformOperationError(platform, "PLATFORM_INTERNAL", message, {
    retryable: true,
    details: { originalError: error },
  });
}

/** Run an adapter operation; classified errors pass through, the rest go through `mapper`. */
export async function withPlatformErrorMapping<T>(
  platform: PlatformName,
  fn: () => Promise<T>,
  mapper?: (error: unknown) => PlatformOperationError
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof PlatformOperationError) throw error;
    if (mapper) throw mapper(error);
    throw mapPlatformOperationError(platform, error);
  }
}
