// capability/matcher.ts - Requirement Matcher
//
// Selects one candidate for a requirement from a pool of live environments and
// provisionable templates. Selection order:
//   live before provisionable -> least slack -> registration order.
// The slack metric is policy and can be swapped per run.

import {
  satisfies,
  slack,
  unsatisfiedDimensions,
  type Capability,
  type Requirement,
  type SlackMeasure,
} from "./model";

// =============================================================================
// Types
// =============================================================================

export type CandidateKind = "live" | "provisionable";

export interface MatchCandidate<T> {
  kind: CandidateKind;
  /** Stable label for logs (environment id or platform/template name) */
  label: string;
  capability: Capability;
  item: T;
}

export interface RankedCandidate<T> {
  candidate: MatchCandidate<T>;
  /** Position in the pool: registration order */
  order: number;
  slack: SlackMeasure;
  score: number;
}

export interface Rejection<T> {
  candidate: MatchCandidate<T>;
  dimensions: string[];
}

export type MatchResult<T> =
  | { kind: "matched"; selected: RankedCandidate<T> }
  | { kind: "no_candidate"; reason: "CAPABILITY_MISMATCH"; rejections: Rejection<T>[] };

/** Collapse a slack measure to a single comparable number. Lower is better. */
export type SlackMetric = (measure: SlackMeasure) => number;

export interface SlackWeights {
  range: number;
  extraMembers: number;
  extraFlags: number;
}

export const DEFAULT_SLACK_WEIGHTS: SlackWeights = {
  range: 1,
  extraMembers: 1,
  extraFlags: 1,
};

export function weightedSlack(weights: SlackWeights = DEFAULT_SLACK_WEIGHTS): SlackMetric {
  return (m) =>
    m.range * weights.range +
    m.extraMembers * weights.extraMembers +
    m.extraFlags * weights.extraFlags;
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * Rank every satisfying candidate, best first. The sort is total: ties on kind
 * and score fall back to pool order, so identical pools always rank the same.
 */
export function rankCandidates<T>(
  requirement: Requirement,
  pool: readonly MatchCandidate<T>[],
  metric: SlackMetric = weightedSlack(),
): RankedCandidate<T>[] {
  const ranked: RankedCandidate<T>[] = [];
  pool.forEach((candidate, order) => {
    if (!satisfies(candidate.capability, requirement)) return;
    const measure = slack(candidate.capability, requirement);
    ranked.push({ candidate, order, slack: measure, score: metric(measure) });
  });

  return ranked.sort((a, b) => {
    if (a.candidate.kind !== b.candidate.kind) {
      return a.candidate.kind === "live" ? -1 : 1;
    }
    if (a.score !== b.score) return a.score - b.score;
    return a.order - b.order;
  });
}

// =============================================================================
// Matching
// =============================================================================

export function matchRequirement<T>(
  requirement: Requirement,
  pool: readonly MatchCandidate<T>[],
  metric?: SlackMetric,
): MatchResult<T> {
  const ranked = rankCandidates(requirement, pool, metric);
  const best = ranked[0];
  if (best) {
    return { kind: "matched", selected: best };
  }

  return {
    kind: "no_candidate",
    reason: "CAPABILITY_MISMATCH",
    rejections: pool.map((candidate) => ({
      candidate,
      dimensions: unsatisfiedDimensions(candidate.capability, requirement),
    })),
  };
}

/** Human-readable explanation of a failed match, for skip messages. */
export function describeRejections<T>(rejections: readonly Rejection<T>[]): string {
  if (rejections.length === 0) return "no candidates available";
  return rejections
    .map((r) => `${r.candidate.label}: ${r.dimensions.length > 0 ? r.dimensions.join(", ") : "incompatible"}`)
    .join("; ");
}
