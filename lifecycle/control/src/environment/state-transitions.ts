// environment/state-transitions.ts - Environment State Machine
// Canonical source for every environment state transition.

import { ConflictError, type EnvironmentState } from "@testyard/contracts";

// =============================================================================
// Transition Result Type
// =============================================================================

export type TransitionResult<T> =
  | { success: true; data: T }
  | { success: false; reason: "WRONG_STATE"; current: T };

export function transitionSuccess<T>(data: T): TransitionResult<T> {
  return { success: true, data };
}

export function transitionFailure<T>(current: T): TransitionResult<T> {
  return { success: false, reason: "WRONG_STATE", current };
}

// =============================================================================
// Environment State Machine
// =============================================================================

// New -> Deleted covers environments discarded before a slot was granted.
// Failed is reachable from every non-terminal state.
export const ENVIRONMENT_TRANSITIONS: Record<EnvironmentState, readonly EnvironmentState[]> = {
  New: ["Preparing", "Deleted", "Failed"],
  Preparing: ["Prepared", "TearingDown", "Failed"],
  Prepared: ["Deploying", "TearingDown", "Failed"],
  Deploying: ["Deployed", "TearingDown", "Failed"],
  Deployed: ["Connecting", "TearingDown", "Failed"],
  Connecting: ["Connected", "TearingDown", "Failed"],
  Connected: ["Executing", "TearingDown", "Failed"],
  Executing: ["Connected", "TearingDown", "Failed"],
  TearingDown: ["Deleted", "Failed"],
  Deleted: [],
  Failed: [],
};

export function canTransition(from: EnvironmentState, to: EnvironmentState): boolean {
  return ENVIRONMENT_TRANSITIONS[from].includes(to);
}

export interface StatefulEnvironment {
  readonly id: string;
  state: EnvironmentState;
}

/**
 * Move `env` to `to` when the table allows it. The previous state is returned
 * in `data` so callers can publish the edge.
 */
export function transitionEnvironment<E extends StatefulEnvironment>(
  env: E,
  to: EnvironmentState
): TransitionResult<EnvironmentState> {
  const from = env.state;
  if (!canTransition(from, to)) {
    return transitionFailure(from);
  }
  env.state = to;
  return transitionSuccess(from);
}

/** Same as transitionEnvironment, but an illegal edge is a ConflictError. */
export function requireTransition<E extends StatefulEnvironment>(
  env: E,
  to: EnvironmentState
): EnvironmentState {
  const result = transitionEnvironment(env, to);
  if (!result.success) {
    throw new ConflictError(`Illegal environment transition ${result.current} -> ${to} for ${env.id}`, {
      details: { environmentId: env.id, from: result.current, to },
    });
  }
  return result.data;
}
