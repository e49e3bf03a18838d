// types.ts - Cross-cutting Primitives and Utilities

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Unix timestamp in milliseconds */
export type TimestampMs = number;

/** Duration in milliseconds */
export type DurationMs = number;

/** Environment identity, assigned by the scheduler (e.g. "env-3") */
export type EnvironmentId = string;

/** Test case identity, unique within one registry (e.g. "core.verify_cpu_count") */
export type TestCaseId = string;

/** Platform adapter name (e.g. 'ready', 'container') */
export type PlatformName = string;

// =============================================================================
// ID UTILITIES
// =============================================================================

/** Format a sequence number as an environment id */
export function formatEnvironmentId(seq: number): EnvironmentId {
  return `env-${seq}`;
}

/** Parse an environment id back to its sequence number */
export function parseEnvironmentId(id: EnvironmentId): number {
  const match = id.match(/^env-(\d+)$/);
  if (!match) {
    throw new Error(`Invalid environment id: "${id}"`);
  }
  return parseInt(match[1] ?? '', 10);
}

// =============================================================================
// STATUS ENUMS
// =============================================================================

/** Environment lifecycle states */
export type EnvironmentState =
  | 'New'
  | 'Preparing'
  | 'Prepared'
  | 'Deploying'
  | 'Deployed'
  | 'Connecting'
  | 'Connected'
  | 'Executing'
  | 'TearingDown'
  | 'Deleted'
  | 'Failed';

export const ENVIRONMENT_STATES: readonly EnvironmentState[] = [
  'New',
  'Preparing',
  'Prepared',
  'Deploying',
  'Deployed',
  'Connecting',
  'Connected',
  'Executing',
  'TearingDown',
  'Deleted',
  'Failed',
];

/** Final per-test outcome */
export type TestStatus = 'Completed' | 'Skipped' | 'Failed' | 'Cancelled';

/** Per-test progress while a run is in flight */
export type TestProgress = 'Pending' | 'Assigned' | 'Running' | TestStatus;

/** Reason attached to a non-Completed outcome */
export type OutcomeReason =
  | 'CAPABILITY_MISMATCH'
  | 'PROVISIONING_FAILED'
  | 'DEPLOYMENT_FAILED'
  | 'CONNECTION_FAILED'
  | 'TEST_FAILED'
  | 'TEST_TIMEOUT'
  | 'CANCELLED';

/** Teardown result recorded on an environment report */
export type TeardownStatus = 'not_required' | 'deleted' | 'failed';

// =============================================================================
// STATE PREDICATES
// =============================================================================

/** Terminal environment states: never reused, never left */
export function isTerminalState(state: EnvironmentState): boolean {
  return state === 'Deleted' || state === 'Failed';
}

/**
 * States that may hold platform resources. These count against the
 * concurrency bound.
 */
export function isResourceHoldingState(state: EnvironmentState): boolean {
  return state !== 'New' && !isTerminalState(state);
}
