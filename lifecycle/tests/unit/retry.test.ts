// tests/unit/retry.test.ts - Retry strategy and adapter error mapping

import { describe, expect, test } from "vitest";
import { determineRetryStrategy, type RetryPolicy } from "../../control/src/environment/retry";
import {
  AuthError,
  CapacityError,
  InvalidSpecError,
  PlatformOperationError,
  RateLimitError,
  mapPlatformOperationError,
  withPlatformErrorMapping,
} from "../../control/src/platform/errors";

const POLICY: RetryPolicy = { maxAttempts: 5, baseDelayMs: 1_000, maxDelayMs: 8_000 };

describe("determineRetryStrategy", () => {
  test("transient errors back off exponentially up to the cap", () => {
    const error = new PlatformOperationError("mock", "PLATFORM_INTERNAL", "boom", { retryable: true });
    const delays = [1, 2, 3, 4].map((attempt) => determineRetryStrategy(error, attempt, POLICY).delayMs);
    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000]);
  });

  test("retry budget is the total number of attempts", () => {
    const error = new CapacityError("mock", "default");
    expect(determineRetryStrategy(error, 4, POLICY).shouldRetry).toBe(true);
    expect(determineRetryStrategy(error, 5, POLICY)).toEqual({ shouldRetry: false, delayMs: 0, maxAttempts: 5 });
  });

  test("timeouts get a tighter bound", () => {
    const error = new PlatformOperationError("mock", "TIMEOUT_ERROR", "slow", { retryable: true });
    expect(determineRetryStrategy(error, 1, POLICY)).toEqual({ shouldRetry: true, delayMs: 1_000, maxAttempts: 2 });
    expect(determineRetryStrategy(error, 2, POLICY).shouldRetry).toBe(false);
  });

  test("adapter-supplied retry_after_ms takes precedence", () => {
    const error = new RateLimitError("mock", 30_000);
    expect(determineRetryStrategy(error, 1, POLICY).delayMs).toBe(30_000);
  });

  test("deterministic failures are never retried", () => {
    expect(determineRetryStrategy(new InvalidSpecError("mock", "default", "bad image"), 1, POLICY)).toEqual({
      shouldRetry: false,
      delayMs: 0,
      maxAttempts: 1,
    });
    expect(determineRetryStrategy(new AuthError("mock", "token expired"), 1, POLICY).shouldRetry).toBe(false);
  });

  test("an adapter can veto retry of a normally transient code", () => {
    const error = new PlatformOperationError("mock", "NETWORK_ERROR", "host unreachable", { retryable: false });
    expect(determineRetryStrategy(error, 1, POLICY).shouldRetry).toBe(false);
  });

  test("single-attempt policy never retries", () => {
    const error = new CapacityError("mock", "default");
    expect(determineRetryStrategy(error, 1, { ...POLICY, maxAttempts: 1 }).shouldRetry).toBe(false);
  });
});

describe("platform error mapping", () => {
  test("unclassified errors become retryable PLATFORM_INTERNAL", () => {
    const mapped = mapPlatformOperationError("mock", new Error("socket hang up"));
    expect(mapped.code).toBe("PLATFORM_INTERNAL");
    expect(mapped.retryable).toBe(true);
    expect(mapped.message).toBe("socket hang up");
    expect(mapped.platform).toBe("mock");
  });

  test("classified errors pass through unchanged", () => {
    const error = new InvalidSpecError("mock", "default", "bad image");
    expect(mapPlatformOperationError("mock", error)).toBe(error);
    expect(error.message).toBe("Invalid template default: bad image");
  });

  test("withPlatformErrorMapping applies the mapper to unclassified errors", async () => {
    const run = withPlatformErrorMapping(
      "mock",
      async () => {
        throw new Error("quota");
      },
      () => new CapacityError("mock", "default", 5_000)
    );
    await expect(run).rejects.toBeInstanceOf(CapacityError);
  });

  test("withPlatformErrorMapping returns the result on success", async () => {
    await expect(withPlatformErrorMapping("mock", async () => 42)).resolves.toBe(42);
  });
});
