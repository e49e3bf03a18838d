// config/timing.ts - Centralized Timing Constants

// =============================================================================
// DURATION PARSING
// =============================================================================

export function parseDuration(value: string): number {
  const match = value.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const [, num = '', unit = ''] = match;
  const n = parseFloat(num);
  switch (unit.toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    case 'd':
      return n * 86_400_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function getEnvDuration(key: string, defaultMs: number): number {
  const value = process.env[key];
  return value ? parseDuration(value) : defaultMs;
}

function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const n = parseInt(value, 10);
  if (!Number.isFinite(n)) throw new Error(`Invalid integer for ${key}: ${value}`);
  return n;
}

// =============================================================================
// BASE TIMING CONSTANTS
// =============================================================================

export const TIMING = {
  // ADAPTER CALLS -- Constraint: call_timeout < run_deadline
  ADAPTER_CALL_TIMEOUT_MS: getEnvDuration('TESTYARD_ADAPTER_CALL_TIMEOUT', 600_000), // 10m
  RUN_DEADLINE_MS: getEnvDuration('TESTYARD_RUN_DEADLINE', 21_600_000), // 6h
  TEST_TIMEOUT_MS: getEnvDuration('TESTYARD_TEST_TIMEOUT', 3_600_000), // 1h
  // Grace for a timed-out test body to stop before its environment is given up
  TEST_SETTLE_MS: getEnvDuration('TESTYARD_TEST_SETTLE', 5_000), // 5s

  // RETRY & BACKOFF -- Constraint: base < max
  RETRY_BASE_DELAY_MS: getEnvDuration('TESTYARD_RETRY_BASE_DELAY', 2_000), // 2s
  RETRY_MAX_DELAY_MS: getEnvDuration('TESTYARD_RETRY_MAX_DELAY', 60_000), // 60s
  RETRY_MAX_ATTEMPTS: getEnvInt('TESTYARD_RETRY_MAX_ATTEMPTS', 3),

  // TEARDOWN -- Constraint: retry_delay < grace
  TEARDOWN_RETRY_ATTEMPTS: getEnvInt('TESTYARD_TEARDOWN_RETRY_ATTEMPTS', 3),
  TEARDOWN_RETRY_DELAY_MS: getEnvDuration('TESTYARD_TEARDOWN_RETRY_DELAY', 5_000), // 5s
  TEARDOWN_GRACE_MS: getEnvDuration('TESTYARD_TEARDOWN_GRACE', 300_000), // 5m

  // SCHEDULER
  CONCURRENCY: getEnvInt('TESTYARD_CONCURRENCY', 1),
  ENVIRONMENT_CAPACITY: getEnvInt('TESTYARD_ENVIRONMENT_CAPACITY', 16),
} as const;

export type TimingConfig = typeof TIMING;
export type TimingKey = keyof TimingConfig;

// =============================================================================
// PLATFORM OVERRIDES
// =============================================================================

interface PlatformTimingOverrides {
  ADAPTER_CALL_TIMEOUT_MS?: number;
  CONCURRENCY?: number;
  TEARDOWN_RETRY_DELAY_MS?: number;
}

// Default concurrency is platform-dependent: local targets are cheap to run in
// parallel, pass-through targets are usually a single machine.
const PLATFORM_OVERRIDES: Record<string, PlatformTimingOverrides> = {
  ready: { ADAPTER_CALL_TIMEOUT_MS: 60_000 }, // 1m
  container: {
    ADAPTER_CALL_TIMEOUT_MS: 300_000, // 5m (image pulls)
    CONCURRENCY: 4,
    TEARDOWN_RETRY_DELAY_MS: 1_000, // 1s
  },
};

export function getPlatformTiming<K extends keyof PlatformTimingOverrides>(
  key: K,
  platform: string,
): number {
  const override = PLATFORM_OVERRIDES[platform]?.[key];
  // Explicit env configuration wins over the platform default
  if (override !== undefined && !isEnvConfigured(key)) {
    return override;
  }
  return TIMING[key];
}

const ENV_KEYS: Record<keyof PlatformTimingOverrides, string> = {
  ADAPTER_CALL_TIMEOUT_MS: 'TESTYARD_ADAPTER_CALL_TIMEOUT',
  CONCURRENCY: 'TESTYARD_CONCURRENCY',
  TEARDOWN_RETRY_DELAY_MS: 'TESTYARD_TEARDOWN_RETRY_DELAY',
};

function isEnvConfigured(key: keyof PlatformTimingOverrides): boolean {
  return Boolean(process.env[ENV_KEYS[key]]);
}

// =============================================================================
// CONSTRAINT VALIDATION
// =============================================================================

/** setTimeout fires immediately for delays above a signed 32-bit int */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const TIMER_KEYS: Record<string, TimingKey> = {
  call_timeout: 'ADAPTER_CALL_TIMEOUT_MS',
  run_deadline: 'RUN_DEADLINE_MS',
  test_timeout: 'TEST_TIMEOUT_MS',
  test_settle: 'TEST_SETTLE_MS',
  retry_max_delay: 'RETRY_MAX_DELAY_MS',
  teardown_retry_delay: 'TEARDOWN_RETRY_DELAY_MS',
  teardown_grace: 'TEARDOWN_GRACE_MS',
};

export function validateTimingConstraints(timing: TimingConfig = TIMING): void {
  const errors: string[] = [];

  for (const [label, key] of Object.entries(TIMER_KEYS)) {
    if (timing[key] > MAX_TIMER_DELAY_MS) {
      errors.push(`Timer: ${label} must be <= ${MAX_TIMER_DELAY_MS}ms`);
    }
  }

  if (timing.ADAPTER_CALL_TIMEOUT_MS >= timing.RUN_DEADLINE_MS) {
    errors.push('Adapter: call_timeout must be < run_deadline');
  }
  if (timing.RETRY_BASE_DELAY_MS >= timing.RETRY_MAX_DELAY_MS) {
    errors.push('Retry: base_delay must be < max_delay');
  }
  if (timing.RETRY_MAX_ATTEMPTS < 1) {
    errors.push('Retry: max_attempts must be >= 1');
  }
  if (timing.TEARDOWN_RETRY_DELAY_MS >= timing.TEARDOWN_GRACE_MS) {
    errors.push('Teardown: retry_delay must be < grace');
  }
  if (timing.CONCURRENCY < 1) {
    errors.push('Scheduler: concurrency must be >= 1');
  }
  if (timing.ENVIRONMENT_CAPACITY < 1) {
    errors.push('Scheduler: environment_capacity must be >= 1');
  }

  if (errors.length > 0) {
    throw new Error(`Timing constraint violations:\n${errors.join('\n')}`);
  }
}

// Validate at module load -- fail fast
validateTimingConstraints();

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Exponential backoff: min(base * 2^attempt, max), where `attempt` counts
 * retries from 0. Jitter is opt-in so that tests and reproducible runs see
 * exact delays.
 */
export function calculateBackoff(
  attempt: number,
  baseMs: number = TIMING.RETRY_BASE_DELAY_MS,
  maxMs: number = TIMING.RETRY_MAX_DELAY_MS,
  jitter = false,
): number {
  const delay = Math.min(baseMs * Math.pow(2, attempt), maxMs);
  if (!jitter) return delay;
  return Math.round(delay + delay * 0.1 * (Math.random() * 2 - 1));
}

/** Format milliseconds to human-readable string */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${ms / 1000}s`;
  if (ms < 3_600_000) return `${ms / 60_000}m`;
  if (ms < 86_400_000) return `${ms / 3_600_000}h`;
  return `${ms / 86_400_000}d`;
}
