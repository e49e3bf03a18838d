// config.ts - Run configuration
//
// Defaults come from TIMING (and TESTYARD_* environment variables); the
// default concurrency and call timeout depend on the platform when a run
// targets a single one.

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { getPlatformTiming, MAX_TIMER_DELAY_MS, TIMING, ValidationError } from "@testyard/contracts";
import { DEFAULT_SLACK_WEIGHTS } from "./capability/matcher";

// =============================================================================
// Schema
// =============================================================================

const SlackWeightsSchema = Type.Object(
  {
    range: Type.Number({ minimum: 0 }),
    extraMembers: Type.Number({ minimum: 0 }),
    extraFlags: Type.Number({ minimum: 0 }),
  },
  { additionalProperties: false }
);

/** A duration that ends up as a setTimeout delay */
const TimerMs = (options: { minimum?: number; exclusiveMinimum?: number }) =>
  Type.Number({ ...options, maximum: MAX_TIMER_DELAY_MS });

export const RunConfigSchema = Type.Object(
  {
    /** Max environments holding resources at once */
    concurrency: Type.Integer({ minimum: 1 }),
    adapterCallTimeoutMs: TimerMs({ exclusiveMinimum: 0 }),
    /** Total attempts per adapter verb */
    retryAttempts: Type.Integer({ minimum: 1 }),
    retryBaseDelayMs: TimerMs({ minimum: 0 }),
    retryMaxDelayMs: TimerMs({ minimum: 0 }),
    runDeadlineMs: TimerMs({ exclusiveMinimum: 0 }),
    testTimeoutMs: TimerMs({ exclusiveMinimum: 0 }),
    teardownRetryAttempts: Type.Integer({ minimum: 1 }),
    teardownRetryDelayMs: TimerMs({ minimum: 0 }),
    /** How long run completion waits on background teardown retries */
    teardownGraceMs: TimerMs({ minimum: 0 }),
    /** Max tests assigned to one environment */
    environmentCapacity: Type.Integer({ minimum: 1 }),
    slackWeights: SlackWeightsSchema,
  },
  { additionalProperties: false }
);

export type RunConfig = Static<typeof RunConfigSchema>;

export type RunConfigInput = Partial<Omit<RunConfig, "slackWeights">> & {
  slackWeights?: Partial<RunConfig["slackWeights"]>;
};

// =============================================================================
// Resolution
// =============================================================================

export function defaultRunConfig(platform?: string): RunConfig {
  return {
    concurrency: platform ? getPlatformTiming("CONCURRENCY", platform) : TIMING.CONCURRENCY,
    adapterCallTimeoutMs: platform
      ? getPlatformTiming("ADAPTER_CALL_TIMEOUT_MS", platform)
      : TIMING.ADAPTER_CALL_TIMEOUT_MS,
    retryAttempts: TIMING.RETRY_MAX_ATTEMPTS,
    retryBaseDelayMs: TIMING.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: TIMING.RETRY_MAX_DELAY_MS,
    runDeadlineMs: TIMING.RUN_DEADLINE_MS,
    testTimeoutMs: TIMING.TEST_TIMEOUT_MS,
    teardownRetryAttempts: TIMING.TEARDOWN_RETRY_ATTEMPTS,
    teardownRetryDelayMs: platform
      ? getPlatformTiming("TEARDOWN_RETRY_DELAY_MS", platform)
      : TIMING.TEARDOWN_RETRY_DELAY_MS,
    teardownGraceMs: TIMING.TEARDOWN_GRACE_MS,
    environmentCapacity: TIMING.ENVIRONMENT_CAPACITY,
    slackWeights: { ...DEFAULT_SLACK_WEIGHTS },
  };
}

/**
 * Overlay `input` on the defaults and validate. `platform` selects
 * platform-dependent defaults when the run targets a single platform.
 */
export function resolveRunConfig(input: RunConfigInput = {}, platform?: string): RunConfig {
  const defaults = defaultRunConfig(platform);
  const candidate: unknown = {
    ...defaults,
    ...definedEntries(input),
    slackWeights: { ...defaults.slackWeights, ...definedEntries(input.slackWeights ?? {}) },
  };

  if (!Value.Check(RunConfigSchema, candidate)) {
    const first = [...Value.Errors(RunConfigSchema, candidate)][0];
    throw new ValidationError(
      `Invalid run configuration: ${first ? `${first.path} ${first.message}` : "schema mismatch"}`,
      { code: "INVALID_CONFIG" }
    );
  }

  if (candidate.retryBaseDelayMs > candidate.retryMaxDelayMs) {
    throw new ValidationError("Invalid run configuration: retryBaseDelayMs must be <= retryMaxDelayMs", {
      code: "INVALID_CONFIG",
    });
  }
  if (candidate.adapterCallTimeoutMs >= candidate.runDeadlineMs) {
    throw new ValidationError("Invalid run configuration: adapterCallTimeoutMs must be < runDeadlineMs", {
      code: "INVALID_CONFIG",
    });
  }

  return candidate;
}

function definedEntries(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
